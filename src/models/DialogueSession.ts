// src/models/DialogueSession.ts
import mongoose, { Schema, Model } from "mongoose";

export type DialogueSessionDoc = {
  key: string;            // session key (Telegram chat id)
  state: unknown;         // EncodedState, validated on read
  version: number;        // bumped on every write, compare-and-swap guard

  // Only set while idle; active sessions never expire
  expiresAt?: Date | null;

  createdAt: Date;
  updatedAt: Date;
};

const DialogueSessionSchema = new Schema<DialogueSessionDoc>(
  {
    key: { type: String, required: true, unique: true, index: true },
    state: { type: Schema.Types.Mixed, required: true },
    version: { type: Number, required: true, default: 0 },
    expiresAt: { type: Date, required: false, default: null },
  },
  { timestamps: true, minimize: false }
);

// TTL index: idle sessions are dropped automatically
DialogueSessionSchema.index({ expiresAt: 1 }, { expireAfterSeconds: 0 });

export const DialogueSession: Model<DialogueSessionDoc> =
  (mongoose.models.DialogueSession as Model<DialogueSessionDoc>) ||
  mongoose.model<DialogueSessionDoc>("DialogueSession", DialogueSessionSchema);
