/**
 * Run invocation schema. A request that fails validation is rejected
 * before any network call is made.
 */
import { z } from "zod";
import { InvalidRunRequestError } from "./exceptions.js";
import { DOCUMENT_CATEGORIES } from "./types.js";

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "must be a YYYY-MM-DD date");

function unique<T>(values: T[]): T[] {
  return [...new Set(values)];
}

export const RunRequestSchema = z
  .object({
    identifiers: z
      .array(z.string())
      .transform((ids) => unique(ids.map((id) => id.trim()).filter(Boolean)))
      .pipe(z.array(z.string()).min(1, "at least one identifier is required")),
    startDate: IsoDate,
    endDate: IsoDate,
    categories: z
      .array(z.string())
      .pipe(z.array(z.enum(DOCUMENT_CATEGORIES)).min(1, "at least one document type is required"))
      .transform(unique),
    bucket: z.string().trim().min(1, "bucket name is required"),
  })
  .refine((r) => r.startDate <= r.endDate, {
    message: "start date must not be after end date",
    path: ["startDate"],
  });

export type RunRequestInput = z.input<typeof RunRequestSchema>;
export type RunRequest = z.output<typeof RunRequestSchema>;

export function parseRunRequest(input: RunRequestInput): RunRequest {
  const parsed = RunRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidRunRequestError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    );
  }
  return parsed.data;
}
