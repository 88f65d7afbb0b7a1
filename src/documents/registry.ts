/**
 * Category registry – maps document categories to artifact strategies.
 */
import type { DocumentCategory } from "../core/types.js";
import type { TranscriptRenderer } from "../render/transcript-pdf.js";
import { AudioArtifactStrategy } from "./audio.js";
import { FileArtifactStrategy } from "./file.js";
import type { ArtifactStrategy } from "./strategy.js";
import { TranscriptArtifactStrategy } from "./transcript.js";

export interface StrategyOptions {
  renderTranscript?: TranscriptRenderer;
}

export type StrategyRegistry = Record<DocumentCategory, ArtifactStrategy>;

export function buildStrategyRegistry(opts: StrategyOptions = {}): StrategyRegistry {
  const file = new FileArtifactStrategy();
  return {
    slides: file,
    report: file,
    transcript: new TranscriptArtifactStrategy(opts.renderTranscript),
    audio: new AudioArtifactStrategy(),
  };
}
