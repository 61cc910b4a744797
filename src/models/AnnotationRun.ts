import { Schema, model } from 'mongoose';

const OutcomeSchema = new Schema(
  {
    documentId: { type: String, required: true },
    status: { type: String, enum: ['ok', 'error'], required: true },
    viewId: { type: String },
    message: { type: String },
  },
  { _id: false }
);

const AnnotationRunSchema = new Schema(
  {
    runId: { type: String, index: true, unique: true },
    config: {
      useSegmentation: { type: Boolean, default: true },
      silenceGapSec: { type: Number, default: 1 },
      timeUnit: { type: String, enum: ['milliseconds', 'seconds'], default: 'milliseconds' },
    },
    recognizer: { type: String },
    outcomes: { type: [OutcomeSchema], default: [] },
    // Full annotated request as returned to the caller.
    result: { type: Schema.Types.Mixed, required: true },
  },
  { timestamps: true }
);

export default model('AnnotationRun', AnnotationRunSchema);
