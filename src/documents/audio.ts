/**
 * Event audio recordings.
 */
import { titleSlug } from "../core/keys.js";
import type { ArtifactResult, Candidate } from "../core/types.js";
import type { HttpSession } from "../http/session.js";
import { fetchOk, readBytes, trailingSegment, type ArtifactStrategy } from "./strategy.js";

export const DEFAULT_AUDIO_EXTENSION = "mp3";

const AUDIO_CONTENT_TYPES: Record<string, string> = {
  mp3: "audio/mpeg",
  mpeg: "audio/mpeg",
  mpga: "audio/mpeg",
  m4a: "audio/mp4",
  mp4: "audio/mp4",
  aac: "audio/aac",
  wav: "audio/wav",
  ogg: "audio/ogg",
  oga: "audio/ogg",
  opus: "audio/opus",
  flac: "audio/flac",
  webm: "audio/webm",
};

/** Lower-cased extension of the URL's last path segment. */
export function audioExtension(url: string): string {
  const segment = trailingSegment(url);
  const dot = segment.lastIndexOf(".");
  if (dot < 0 || dot === segment.length - 1) return DEFAULT_AUDIO_EXTENSION;
  return segment.slice(dot + 1).toLowerCase();
}

export function audioContentType(extension: string): string {
  return AUDIO_CONTENT_TYPES[extension] ?? "application/octet-stream";
}

export class AudioArtifactStrategy implements ArtifactStrategy {
  async fetchArtifact(candidate: Candidate, session: HttpSession): Promise<ArtifactResult> {
    const fetched = await fetchOk(session, candidate.url);
    if (!fetched.ok) return fetched;

    const body = await readBytes(fetched.response);
    if (!body.ok) return body;

    const extension = audioExtension(candidate.url);
    return {
      ok: true,
      artifact: {
        data: body.data,
        contentType: audioContentType(extension),
        filename: `${titleSlug(candidate.event.title)}.${extension}`,
      },
    };
  }
}
