/**
 * Transcripts: raw JSON → one sentence per line → PDF.
 */
import { ArtifactFetchError } from "../core/exceptions.js";
import { titleSlug } from "../core/keys.js";
import type { ArtifactResult, Candidate } from "../core/types.js";
import type { HttpSession } from "../http/session.js";
import { TranscriptPayloadSchema } from "../provider/schemas.js";
import { renderTranscriptPdf, type TranscriptRenderer } from "../render/transcript-pdf.js";
import { fetchOk, type ArtifactStrategy } from "./strategy.js";

/** "A. B. C" → "A.\nB.\nC" */
export function formatTranscriptText(text: string): string {
  return text.split(". ").join(".\n");
}

export type TranscriptTextResult =
  | { ok: true; text: string }
  | { ok: false; reason: string };

export function transcriptFilename(eventTitle: string): string {
  return `${titleSlug(eventTitle)}_transcript.pdf`;
}

export class TranscriptArtifactStrategy implements ArtifactStrategy {
  private render: TranscriptRenderer;

  constructor(render: TranscriptRenderer = renderTranscriptPdf) {
    this.render = render;
  }

  /** Fetch the raw transcript JSON and format its text. */
  async fetchText(url: string, session: HttpSession): Promise<TranscriptTextResult> {
    const fetched = await fetchOk(session, url);
    if (!fetched.ok) return fetched;

    const contentType = fetched.response.headers.get("content-type") ?? "";
    if (!contentType.includes("application/json")) {
      await fetched.response.discard();
      return { ok: false, reason: `Unexpected content type for transcript: ${contentType || "none"}` };
    }

    let body: unknown;
    try {
      body = await fetched.response.json();
    } catch (err) {
      if (err instanceof ArtifactFetchError) return { ok: false, reason: err.message };
      return { ok: false, reason: `Error decoding transcript JSON from ${url}` };
    }

    const parsed = TranscriptPayloadSchema.safeParse(body);
    const text = parsed.success ? parsed.data.transcript?.text ?? "" : "";
    if (!text) return { ok: false, reason: `Transcript at ${url} has no text` };
    return { ok: true, text: formatTranscriptText(text) };
  }

  async fetchArtifact(candidate: Candidate, session: HttpSession): Promise<ArtifactResult> {
    const { company, event } = candidate;
    if (!event.transcriptUrl) {
      return { ok: false, reason: `No raw transcript URL for "${event.title}"` };
    }

    const fetched = await this.fetchText(event.transcriptUrl, session);
    if (!fetched.ok) return fetched;

    const data = await this.render({
      companyName: company.displayName,
      eventTitle: event.title,
      eventDate: event.date,
      text: fetched.text,
    });
    return {
      ok: true,
      artifact: {
        data,
        contentType: "application/pdf",
        filename: transcriptFilename(event.title),
      },
    };
  }
}
