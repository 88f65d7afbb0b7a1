/**
 * Zod schemas for raw provider responses.
 */
import { z } from "zod";

const OptionalUrl = z.string().optional().nullable();

export const ProviderEventSchema = z.object({
  eventDate: z.string().optional().nullable(),
  eventTitle: z.string().optional().nullable(),
  eventType: z
    .object({ type: z.string().optional().nullable() })
    .optional()
    .nullable(),
  slidesUrl: OptionalUrl,
  reportUrl: OptionalUrl,
  transcriptUrl: OptionalUrl,
  audioUrl: OptionalUrl,
  transcripts: z
    .object({ transcriptUrl: OptionalUrl })
    .optional()
    .nullable(),
});

export const ProviderCompanySchema = z.object({
  displayName: z.string().optional().nullable(),
  isins: z.array(z.string()).optional().nullable(),
  // Events are checked one by one so a malformed entry drops only itself.
  events: z.array(z.unknown()),
});

export const TranscriptPayloadSchema = z.object({
  transcript: z
    .object({ text: z.string().optional().nullable() })
    .optional()
    .nullable(),
});

export type ProviderEvent = z.infer<typeof ProviderEventSchema>;
export type ProviderCompany = Omit<z.infer<typeof ProviderCompanySchema>, "events"> & {
  events: ProviderEvent[];
};
export type TranscriptPayload = z.infer<typeof TranscriptPayloadSchema>;
