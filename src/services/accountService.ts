// src/services/accountService.ts

import bcrypt from "bcryptjs";
import { Model } from "mongoose";
import { z } from "zod";
import { IAccount } from "../models/Account";
import { makeGuid } from "../utils/guid";
import { isPlainRecord } from "../utils/legacyFields";
import { ServiceResult, toFieldErrors, validationFailure } from "../utils/validation";

export type PublicAccount = Omit<IAccount, "password">;

const AccountInputSchema = z.object({
  name: z
    .string({ required_error: "name is required.", invalid_type_error: "name must be a string." })
    .trim()
    .min(1, "name is required."),
  email: z
    .string({ required_error: "email is required.", invalid_type_error: "invalid email format." })
    .trim()
    .toLowerCase()
    .email("invalid email format."),
  password: z
    .string({
      required_error: "password is required.",
      invalid_type_error: "password must be a string.",
    })
    .min(6, "password must be at least 6 characters."),
});

const AccountUpdateSchema = AccountInputSchema.partial();

export const hashPassword = async (password: string): Promise<string> => {
  const salt = await bcrypt.genSalt(10);
  return bcrypt.hash(password, salt);
};

export const toPublicAccount = (account: IAccount): PublicAccount => {
  const { password, ...rest } = account;
  return rest;
};

const missingBody = { success: false, statusCode: 400, message: "Missing JSON body" } as const;
const duplicateEmail = { success: false, statusCode: 400, message: "Email already exists" } as const;

export async function createAccount(
  model: Model<IAccount>,
  body: unknown,
  now: () => Date = () => new Date()
): Promise<ServiceResult<PublicAccount>> {
  if (!isPlainRecord(body)) return missingBody;

  const parsed = AccountInputSchema.safeParse(body);
  if (!parsed.success) {
    return validationFailure(toFieldErrors(parsed.error));
  }

  const { name, email, password } = parsed.data;
  if (await model.exists({ email })) return duplicateEmail;

  const account: IAccount = {
    _id: makeGuid(),
    name,
    email,
    password: await hashPassword(password),
    created_at: now().toISOString(),
  };
  await model.create(account);

  return { success: true, data: toPublicAccount(account) };
}

/**
 * Applies a partial update. A new password is hashed before it is stored and
 * a new email must not belong to another account of the same kind.
 */
export async function updateAccount(
  model: Model<IAccount>,
  label: string,
  id: string,
  body: unknown,
  now: () => Date = () => new Date()
): Promise<ServiceResult<PublicAccount>> {
  if (!isPlainRecord(body)) return missingBody;

  const parsed = AccountUpdateSchema.safeParse(body);
  if (!parsed.success) {
    return validationFailure(toFieldErrors(parsed.error));
  }

  const { name, email, password } = parsed.data;
  const updates: Partial<IAccount> = {};
  if (name !== undefined) updates.name = name;
  if (email !== undefined) {
    if (await model.exists({ email, _id: { $ne: id } })) return duplicateEmail;
    updates.email = email;
  }
  if (password !== undefined) updates.password = await hashPassword(password);

  if (Object.keys(updates).length === 0) {
    return { success: false, statusCode: 400, message: "No updatable fields provided" };
  }
  updates.updated_at = now().toISOString();

  const updated = await model
    .findOneAndUpdate({ _id: id }, { $set: updates }, { new: true })
    .lean<PublicAccount | null>();
  if (!updated) {
    return { success: false, statusCode: 404, message: `${label} not found` };
  }
  return { success: true, data: updated };
}
