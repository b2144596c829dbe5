/**
 * HTTP request statistics.
 *
 * Counts what the file system asked the service for, one entry per logical
 * request (transport-level retries are not visible here).
 */

/** Snapshot of collected statistics */
export interface HttpStatsSnapshot {
  headCount: number;
  getCount: number;
  putCount: number;
  postCount: number;
  totalBytesReceived: number;
  totalBytesSent: number;
}

/**
 * Sink for request statistics, supplied by the host.
 */
export interface HttpStatsSink {
  recordRequest(method: string, bytesReceived: number, bytesSent: number): void;
}

/**
 * In-process statistics collector.
 */
export class HttpStats implements HttpStatsSink {
  private headCount = 0;
  private getCount = 0;
  private putCount = 0;
  private postCount = 0;
  private totalBytesReceived = 0;
  private totalBytesSent = 0;

  recordRequest(method: string, bytesReceived: number, bytesSent: number): void {
    switch (method.toUpperCase()) {
      case 'HEAD':
        this.headCount++;
        break;
      case 'GET':
        this.getCount++;
        break;
      case 'PUT':
        this.putCount++;
        break;
      case 'POST':
        this.postCount++;
        break;
      default:
        break;
    }
    this.totalBytesReceived += bytesReceived;
    this.totalBytesSent += bytesSent;
  }

  snapshot(): HttpStatsSnapshot {
    return {
      headCount: this.headCount,
      getCount: this.getCount,
      putCount: this.putCount,
      postCount: this.postCount,
      totalBytesReceived: this.totalBytesReceived,
      totalBytesSent: this.totalBytesSent,
    };
  }

  reset(): void {
    this.headCount = 0;
    this.getCount = 0;
    this.putCount = 0;
    this.postCount = 0;
    this.totalBytesReceived = 0;
    this.totalBytesSent = 0;
  }
}
