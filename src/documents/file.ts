/**
 * Slides, reports and any other directly downloadable document.
 */
import type { ArtifactResult, Candidate } from "../core/types.js";
import type { HttpSession } from "../http/session.js";
import { fetchOk, readBytes, trailingSegment, type ArtifactStrategy } from "./strategy.js";

export const DEFAULT_FILE_CONTENT_TYPE = "application/pdf";

export class FileArtifactStrategy implements ArtifactStrategy {
  async fetchArtifact(candidate: Candidate, session: HttpSession): Promise<ArtifactResult> {
    const fetched = await fetchOk(session, candidate.url);
    if (!fetched.ok) return fetched;

    const { response } = fetched;
    const body = await readBytes(response);
    if (!body.ok) return body;
    return {
      ok: true,
      artifact: {
        data: body.data,
        contentType: response.headers.get("content-type") || DEFAULT_FILE_CONTENT_TYPE,
        filename: trailingSegment(candidate.url) || candidate.category,
      },
    };
  }
}
