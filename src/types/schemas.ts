import { z } from "zod";
import { CURRENCIES } from "./index.js";

export const CurrencySchema = z.enum(CURRENCIES);

const MoneySchema = z.number().int();

export const TargetSchema = z.object({
  member: z.string(),
  amount: MoneySchema.nullable(),
});

export const SettlementSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  amount: MoneySchema.positive(),
});

export const LoggedCommandSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("split"),
    name: z.string(),
    amount: MoneySchema,
    from: z.array(TargetSchema),
    to: z.array(TargetSchema),
    directives: z.object({ from: z.array(z.string()), to: z.array(z.string()) }),
    balanceRest: z.boolean(),
  }),
  z.object({
    kind: z.literal("pay"),
    amount: MoneySchema,
    from: z.string(),
    to: z.string(),
  }),
  z.object({
    kind: z.literal("settle"),
    transactions: z.array(SettlementSchema),
  }),
]);
