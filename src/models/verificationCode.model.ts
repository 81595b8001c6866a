import mongoose, { Schema, Model } from "mongoose";
import type { CodePurpose } from "../auth/credentialStore";

export interface IVerificationCode {
  email: string;
  purpose: CodePurpose;
  code: string;
  issuedAt: Date;
  expiresAt: Date;
  consumed: boolean;
  consumedAt?: Date;
}

const verificationCodeSchema = new Schema<IVerificationCode>({
  email: { type: String, required: true, lowercase: true, trim: true },
  purpose: { type: String, enum: ["signup", "password_reset"], required: true },
  code: { type: String, required: true },
  issuedAt: { type: Date, required: true },
  expiresAt: { type: Date, required: true },
  consumed: { type: Boolean, default: false },
  consumedAt: { type: Date },
});

// one record per email+purpose; re-issuing overwrites it
verificationCodeSchema.index({ email: 1, purpose: 1 }, { unique: true });
// housekeeping only, expiry itself is enforced in code
verificationCodeSchema.index({ expiresAt: 1 }, { expireAfterSeconds: 24 * 60 * 60 });

export const VerificationCodeModel: Model<IVerificationCode> = mongoose.model<IVerificationCode>(
  "VerificationCode",
  verificationCodeSchema
);
