import { sqliteTable, text, integer } from "drizzle-orm/sqlite-core";

export const ledgerSettings = sqliteTable("ledger_settings", {
  key: text("key").primaryKey(), // "version" | "current_group"
  value: text("value").notNull(),
});

export const ledgerGroups = sqliteTable("ledger_groups", {
  name: text("name").primaryKey(),
  currency: text("currency").notNull().default("EUR"),
  position: integer("position").notNull(),
});

export const groupMembers = sqliteTable("group_members", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  groupName: text("group_name").notNull().references(() => ledgerGroups.name, { onDelete: "cascade" }),
  name: text("name").notNull(),
  balance: integer("balance").notNull(), // cents
  position: integer("position").notNull(),
});

export const logEntries = sqliteTable("log_entries", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  groupName: text("group_name").notNull().references(() => ledgerGroups.name, { onDelete: "cascade" }),
  position: integer("position").notNull(),
  command: text("command").notNull(), // JSON encoded LoggedCommand
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
});

export const logChanges = sqliteTable("log_changes", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  logEntryId: integer("log_entry_id").notNull().references(() => logEntries.id, { onDelete: "cascade" }),
  memberName: text("member_name").notNull(),
  amount: integer("amount").notNull(), // cents
});
