/**
 * Mock HTTP transport for testing.
 *
 * Enqueue responses, run the code under test, then inspect the recorded
 * requests.
 */

import type { HttpRequest, HttpResponse, HttpTransport } from "../transport/index.js";

/**
 * A queued reply: a response, an error to throw, or a function computing
 * either from the request.
 */
export type MockReply = HttpResponse | Error | ((request: HttpRequest) => HttpResponse | Promise<HttpResponse>);

/**
 * Mock transport implementation for testing.
 *
 * @example
 * ```typescript
 * // Arrange
 * const transport = new MockTransport();
 * transport.enqueueJsonResponse(200, { access_token: "test-token", expires_in: 3600 });
 *
 * // Act
 * const token = await provider.getAccessToken();
 *
 * // Assert
 * expect(token).toBe("test-token");
 * transport.verifyRequestCount(1);
 * ```
 */
export class MockTransport implements HttpTransport {
  private replies: MockReply[] = [];
  private requests: HttpRequest[] = [];

  /**
   * Enqueue a raw response to be returned by the next request.
   */
  enqueueResponse(status: number, body: string = "", headers: Record<string, string> = {}): void {
    this.replies.push({ status, body, headers });
  }

  /**
   * Enqueue a JSON response with the given status code and body.
   */
  enqueueJsonResponse(status: number, body: unknown): void {
    this.enqueueResponse(status, JSON.stringify(body), { "content-type": "application/json" });
  }

  /**
   * Enqueue a Firestore error response.
   */
  enqueueErrorResponse(status: number, reason: string, message: string): void {
    this.enqueueJsonResponse(status, { error: { code: status, message, status: reason } });
  }

  /**
   * Make the next request fail with an error.
   */
  enqueueError(error: Error): void {
    this.replies.push(error);
  }

  /**
   * Compute the next response from the request.
   */
  enqueueHandler(handler: (request: HttpRequest) => HttpResponse | Promise<HttpResponse>): void {
    this.replies.push(handler);
  }

  /**
   * Number of replies not yet consumed.
   */
  get pendingReplies(): number {
    return this.replies.length;
  }

  /**
   * Get all requests that were made.
   */
  getRequests(): HttpRequest[] {
    return [...this.requests];
  }

  /**
   * Get the last request that was made.
   */
  getLastRequest(): HttpRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  /**
   * Verify that exactly the expected number of requests were made.
   * @throws {Error} If the actual count doesn't match expected
   */
  verifyRequestCount(expected: number): void {
    if (this.requests.length !== expected) {
      throw new Error(`Expected ${expected} requests, got ${this.requests.length}`);
    }
  }

  /**
   * Clear queued replies and recorded requests.
   */
  reset(): void {
    this.replies = [];
    this.requests = [];
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);

    const reply = this.replies.shift();
    if (!reply) {
      throw new Error(`No response configured in MockTransport for ${request.method} ${request.url}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    if (typeof reply === "function") {
      return reply(request);
    }
    return reply;
  }
}
