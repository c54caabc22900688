/**
 * A downloaded image bound to one dispatch call.
 *
 * Wraps the fetch Response so an oversized declared body can be rejected
 * unread, and so an unread body can be cancelled on close.
 */
export class ImageAttachment {
  private buffer: ArrayBuffer | null = null;
  private isClosed = false;

  private constructor(
    readonly url: string,
    private readonly response: Response,
  ) {}

  /**
   * Issues the GET. Network errors and non-2xx responses reject;
   * the body of a failed response is cancelled first.
   */
  static async open(url: string): Promise<ImageAttachment> {
    const response = await fetch(url);
    if (!response.ok) {
      await response.body?.cancel().catch(() => {});
      throw new Error(`${response.status} ${response.statusText}`.trim());
    }
    return new ImageAttachment(url, response);
  }

  /** Media type without parameters, e.g. `image/png`. Empty when absent. */
  get contentType(): string {
    const header = this.response.headers.get('content-type') ?? '';
    return (header.split(';')[0] ?? '').trim();
  }

  /** Last path segment of the URL, used as the upload filename. */
  get filename(): string {
    try {
      const segment = new URL(this.url).pathname.split('/').pop();
      return segment ? decodeURIComponent(segment) : 'attachment';
    } catch {
      return 'attachment';
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Content-Length as sent by the server, or null when absent or malformed.
   * Only good for an early reject: the decoded body may be larger.
   */
  get declaredSize(): number | null {
    const declared = this.response.headers.get('content-length');
    return declared !== null && /^\d+$/.test(declared.trim()) ? Number(declared) : null;
  }

  /** Length of the downloaded body; reads it on first call. */
  async size(): Promise<number> {
    return (await this.bytes()).byteLength;
  }

  async bytes(): Promise<ArrayBuffer> {
    if (this.isClosed) {
      throw new Error(`Attachment for '${this.url}' is already closed`);
    }
    if (this.buffer === null) {
      this.buffer = await this.response.arrayBuffer();
    }
    return this.buffer;
  }

  /** Releases the body. Safe to call more than once. */
  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    if (this.buffer === null && !this.response.bodyUsed) {
      await this.response.body?.cancel().catch(() => {});
    }
    this.buffer = null;
  }
}
