import mongoose, { Schema, Model } from "mongoose";

export type PollerLeaseDoc = {
  key: string;            // e.g. "telegram_polling"
  holder: string;         // instance id
  expiresAt: Date;        // lease end; anyone may take it after this
  createdAt: Date;
  updatedAt: Date;
};

const PollerLeaseSchema = new Schema<PollerLeaseDoc>(
  {
    key: { type: String, required: true, unique: true, index: true },
    holder: { type: String, required: true },
    expiresAt: { type: Date, required: true, index: true }
  },
  { timestamps: true }
);

export const PollerLease: Model<PollerLeaseDoc> =
  (mongoose.models.PollerLease as Model<PollerLeaseDoc>) ||
  mongoose.model<PollerLeaseDoc>("PollerLease", PollerLeaseSchema);
