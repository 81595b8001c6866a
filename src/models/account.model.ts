import mongoose, { Schema, Model } from 'mongoose';

export interface IAccount {
  email: string;
  name: string;
  passwordHash: string;
  createdAt: Date;
  updatedAt: Date;
}

const AccountSchema = new Schema<IAccount>(
  {
    email: { type: String, required: true, unique: true, lowercase: true, trim: true },
    name: { type: String, required: true, trim: true },
    passwordHash: { type: String, required: true },
  },
  { timestamps: true }
);

export const AccountModel: Model<IAccount> = mongoose.model<IAccount>('Account', AccountSchema);
