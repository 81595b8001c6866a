// src/auth/mongoCredentialStore.ts
import { Types, mongo } from "mongoose";
import { AccountModel, IAccount } from "../models/account.model";
import { IVerificationCode, VerificationCodeModel } from "../models/verificationCode.model";
import {
  Account,
  CodeIssue,
  CodePurpose,
  CredentialStore,
  NewAccount,
  VerificationCode,
} from "./credentialStore";

const DUPLICATE_KEY = 11000;

function toAccount(doc: Pick<IAccount, "email" | "name" | "passwordHash" | "createdAt"> & { _id: Types.ObjectId }): Account {
  return Object.freeze({
    id: String(doc._id),
    email: doc.email,
    name: doc.name,
    passwordHash: doc.passwordHash,
    createdAt: doc.createdAt,
  });
}

function toCode(doc: IVerificationCode): VerificationCode {
  return Object.freeze({
    email: doc.email,
    purpose: doc.purpose,
    code: doc.code,
    issuedAt: doc.issuedAt,
    expiresAt: doc.expiresAt,
    consumed: doc.consumed,
  });
}

/** mongoose-backed store; every mutation is a single atomic document operation. */
export class MongoCredentialStore implements CredentialStore {
  async findAccount(email: string) {
    const doc = await AccountModel.findOne({ email }).lean();
    return doc ? toAccount(doc) : null;
  }

  async createAccount(input: NewAccount) {
    try {
      const doc = await AccountModel.create(input);
      return toAccount(doc);
    } catch (err) {
      if (err instanceof mongo.MongoServerError && err.code === DUPLICATE_KEY) {
        return null;
      }
      throw err;
    }
  }

  async updatePasswordHash(email: string, passwordHash: string) {
    const res = await AccountModel.updateOne({ email }, { $set: { passwordHash } });
    return res.matchedCount === 1;
  }

  async findActiveCode(email: string, purpose: CodePurpose) {
    const doc = await VerificationCodeModel.findOne({ email, purpose, consumed: false }).lean();
    return doc ? toCode(doc) : null;
  }

  async upsertCode(input: CodeIssue) {
    const doc = await VerificationCodeModel.findOneAndUpdate(
      { email: input.email, purpose: input.purpose },
      {
        $set: { code: input.code, issuedAt: input.issuedAt, expiresAt: input.expiresAt, consumed: false },
        $unset: { consumedAt: 1 },
      },
      { upsert: true, new: true, setDefaultsOnInsert: true }
    ).lean();
    if (!doc) {
      throw new Error(`Upsert of ${input.purpose} code for ${input.email} returned no document`);
    }
    return toCode(doc);
  }

  async consumeCode(code: VerificationCode) {
    const res = await VerificationCodeModel.updateOne(
      { email: code.email, purpose: code.purpose, code: code.code, issuedAt: code.issuedAt, consumed: false },
      { $set: { consumed: true, consumedAt: new Date() } }
    );
    return res.modifiedCount === 1;
  }
}
