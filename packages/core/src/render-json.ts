import { Schema } from "effect";
import type { Correction } from "./correction.js";

const CorrectionReportSchema = Schema.Struct({
  original: Schema.String,
  annotated: Schema.String,
  accepted: Schema.String,
  summary: Schema.Struct({
    deletions: Schema.Number,
    insertions: Schema.Number,
    deletedChars: Schema.Number,
    insertedChars: Schema.Number,
    balanced: Schema.Boolean,
  }),
});
const CorrectionReportJson = Schema.parseJson(CorrectionReportSchema, {
  space: 2,
});

export type CorrectionReport = Schema.Schema.Type<typeof CorrectionReportSchema>;

export function correctionReport(correction: Correction): CorrectionReport {
  return {
    original: correction.original,
    annotated: correction.annotated,
    accepted: correction.accepted,
    summary: correction.summary,
  };
}

export function renderCorrectionJson(correction: Correction) {
  return Schema.encodeSync(CorrectionReportJson)(correctionReport(correction));
}
