import { z } from "zod";
import { createConfig } from "./config";
import { AnalysisError } from "./errors";
import { analyze } from "./pipeline";
import type { ReportLine } from "./types";

export const analyzeRequestSchema = z.object({
  roster: z.string(),
  meetings: z.string(),
  clamp: z.boolean().optional(),
});

export type AnalyzeRequest = z.infer<typeof analyzeRequestSchema>;

/**
 * A report line as sent over JSON. `Infinity` and `NaN` have no JSON form, so
 * non-finite probabilities are sent as the strings "Infinity", "-Infinity" and
 * "NaN".
 */
export type ReportLineJson = Omit<ReportLine, "probability"> & {
  probability: number | string;
};

export function toReportLineJson(line: ReportLine): ReportLineJson {
  const { probability } = line;
  return {
    ...line,
    probability: Number.isFinite(probability) ? probability : String(probability),
  };
}

export type HandlerResponse = {
  status: number;
  body: unknown;
};

/**
 * Handles `POST /analyze`.
 *
 * - 400 when the body does not match the schema
 * - 422 when the inputs fail analysis (malformed row, unknown participant...)
 * - 200 with the report lines and the per-band id lists otherwise
 */
export function handleAnalyzeRequest(body: unknown): HandlerResponse {
  const parsed = analyzeRequestSchema.safeParse(body);
  if (!parsed.success) {
    return {
      status: 400,
      body: {
        error: {
          code: "VALIDATION_ERROR",
          message: "Invalid input",
          fields: parsed.error.issues.map((i) => ({
            field: i.path.join("."),
            reason: i.message,
          })),
        },
      },
    };
  }

  const { roster, meetings, clamp } = parsed.data;
  const config = createConfig({ clampTransmission: clamp ?? false });

  try {
    const result = analyze(roster, meetings, config);
    return {
      status: 200,
      body: {
        data: result.lines.map(toReportLineJson),
        lists: result.lists,
        degenerate: result.degenerate,
      },
    };
  } catch (err) {
    if (err instanceof AnalysisError) {
      return { status: 422, body: { error: err.toJSON() } };
    }
    throw err;
  }
}
