/**
 * Run-scoped HTTP session over fetch.
 *
 * Every request gets its own timeout, which covers the body as well as the
 * headers. Closing the session aborts whatever is still in flight; later
 * requests fail immediately.
 */
import { ArtifactFetchError } from "../core/exceptions.js";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpSessionOptions {
  timeoutMs?: number;
  fetch?: FetchLike;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Timeout and close wiring for one request, live until its body is consumed. */
export class RequestGuard {
  private controller = new AbortController();
  private session: AbortSignal;
  private timeoutMs: number;
  private timer: ReturnType<typeof setTimeout>;
  private onClose = () => this.controller.abort();

  constructor(session: AbortSignal, timeoutMs: number) {
    this.session = session;
    this.timeoutMs = timeoutMs;
    this.timer = setTimeout(() => this.controller.abort(), timeoutMs);
    session.addEventListener("abort", this.onClose, { once: true });
    this.controller.signal.addEventListener("abort", () => this.release(), { once: true });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  reason(): string {
    return this.session.aborted ? "session closed" : `timed out after ${this.timeoutMs}ms`;
  }

  /** Settle with `work`, or reject as soon as the request is aborted. */
  async run<T>(url: string, work: Promise<T>): Promise<T> {
    let onAbort = (): void => {};
    const aborted = new Promise<never>((_resolve, reject) => {
      onAbort = () => reject(new ArtifactFetchError(url, this.reason()));
      if (this.signal.aborted) onAbort();
      else this.signal.addEventListener("abort", onAbort, { once: true });
    });
    try {
      return await Promise.race([work, aborted]);
    } catch (err) {
      if (err instanceof ArtifactFetchError) throw err;
      throw new ArtifactFetchError(url, this.signal.aborted ? this.reason() : errorMessage(err));
    } finally {
      this.signal.removeEventListener("abort", onAbort);
    }
  }

  release(): void {
    clearTimeout(this.timer);
    this.session.removeEventListener("abort", this.onClose);
  }
}

/**
 * Response whose body reads stay under the request's timeout and the
 * session's close. Read the body once, or `discard()` it.
 */
export class SessionResponse {
  readonly url: string;
  readonly status: number;
  readonly headers: Headers;
  private response: Response;
  private guard: RequestGuard;

  constructor(url: string, response: Response, guard: RequestGuard) {
    this.url = url;
    this.status = response.status;
    this.headers = response.headers;
    this.response = response;
    this.guard = guard;
  }

  async bytes(): Promise<Uint8Array> {
    return new Uint8Array(await this.read(this.response.arrayBuffer()));
  }

  async text(): Promise<string> {
    return this.read(this.response.text());
  }

  /** Parsed body. Transport failures raise ArtifactFetchError, malformed JSON a SyntaxError. */
  async json(): Promise<unknown> {
    return JSON.parse(await this.text());
  }

  /** Drop the body unread and free the connection. */
  async discard(): Promise<void> {
    this.guard.release();
    await this.response.body?.cancel();
  }

  private async read<T>(body: Promise<T>): Promise<T> {
    try {
      return await this.guard.run(this.url, body);
    } finally {
      this.guard.release();
    }
  }
}

export class HttpSession {
  private controller = new AbortController();
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(opts: HttpSessionOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = opts.fetch ?? fetch;
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  /** GET `url`. Transport errors and timeouts raise ArtifactFetchError. */
  async get(url: string, headers: Record<string, string> = {}): Promise<SessionResponse> {
    if (this.closed) throw new ArtifactFetchError(url, "session closed");

    const guard = new RequestGuard(this.controller.signal, this.timeoutMs);
    try {
      const response = await guard.run(
        url,
        this.fetchImpl(url, { method: "GET", headers, signal: guard.signal }),
      );
      return new SessionResponse(url, response, guard);
    } catch (err) {
      guard.release();
      throw err;
    }
  }

  close(): void {
    this.controller.abort();
  }
}
