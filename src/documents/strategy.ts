/**
 * Per-category artifact strategies: fetch (and transform) one candidate's
 * document into uploadable bytes.
 */
import { ArtifactFetchError } from "../core/exceptions.js";
import type { ArtifactResult, Candidate } from "../core/types.js";
import type { HttpSession, SessionResponse } from "../http/session.js";

export interface ArtifactStrategy {
  /**
   * Produce the artifact for `candidate`, or `{ ok: false }` when nothing
   * could be fetched. Unexpected errors propagate to the caller.
   */
  fetchArtifact(candidate: Candidate, session: HttpSession): Promise<ArtifactResult>;
}

export type FetchResult =
  | { ok: true; response: SessionResponse }
  | { ok: false; reason: string };

export type BytesResult =
  | { ok: true; data: Uint8Array }
  | { ok: false; reason: string };

/** GET `url`, folding transport errors and non-200 statuses into `{ ok: false }`. */
export async function fetchOk(session: HttpSession, url: string): Promise<FetchResult> {
  let response: SessionResponse;
  try {
    response = await session.get(url);
  } catch (err) {
    if (err instanceof ArtifactFetchError) return { ok: false, reason: err.message };
    throw err;
  }
  if (response.status !== 200) {
    await response.discard();
    return { ok: false, reason: `Fetch of ${url} returned status ${response.status}` };
  }
  return { ok: true, response };
}

/** Read the whole body; a stalled or aborted download comes back as `{ ok: false }`. */
export async function readBytes(response: SessionResponse): Promise<BytesResult> {
  try {
    return { ok: true, data: await response.bytes() };
  } catch (err) {
    if (err instanceof ArtifactFetchError) return { ok: false, reason: err.message };
    throw err;
  }
}

/** Last path segment of a URL as written, without query string or fragment. */
export function trailingSegment(url: string): string {
  return url.split(/[?#]/)[0].split("/").pop() ?? "";
}
