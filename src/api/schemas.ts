import { z } from "zod";
import { CurrencySchema, SettlementSchema } from "../types/schemas.js";

const MemberListSchema = z.array(z.string()).min(1);

// Amounts are integer cents
const CentsSchema = z.number().int();

export const CreateGroupBodySchema = z.object({
  name: z.string().min(1),
  members: MemberListSchema,
  currency: CurrencySchema.optional(),
});

export const AddMembersBodySchema = z.object({
  members: MemberListSchema,
});

export const RemoveMembersBodySchema = z.object({
  members: MemberListSchema,
  force: z.boolean().optional(),
});

export const CreateExpenseBodySchema = z.object({
  amount: CentsSchema,
  from: z.array(z.string()).min(1),
  to: z.array(z.string()).optional(),
  name: z.string().default(""),
  balanceRest: z.boolean().optional(),
});

export const CreatePaymentBodySchema = z.object({
  amount: CentsSchema.positive(),
  from: z.string().min(1),
  to: z.string().min(1),
});

export const UndoBodySchema = z.object({
  index: z.number().int().nonnegative().optional(),
});

export const ApplySettlementBodySchema = z.object({
  transactions: z.array(SettlementSchema),
});
