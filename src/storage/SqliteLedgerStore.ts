import { asc } from "drizzle-orm";
import { emptySnapshot } from "../ledger/Ledger.js";
import { CurrencySchema, LoggedCommandSchema } from "../types/schemas.js";
import type { GroupSnapshot, LedgerSnapshot, LogEntry, TransactionChange } from "../types/index.js";
import type { LedgerDatabase } from "./db.js";
import type { LedgerStore } from "./LedgerStore.js";
import { groupMembers, ledgerGroups, ledgerSettings, logChanges, logEntries } from "./schema.js";

const VERSION_KEY = "version";
const CURRENT_GROUP_KEY = "current_group";

function groupBy<T, K>(rows: T[], key: (row: T) => K): Map<K, T[]> {
  const grouped = new Map<K, T[]>();
  for (const row of rows) {
    const bucket = grouped.get(key(row));
    if (bucket) {
      bucket.push(row);
    } else {
      grouped.set(key(row), [row]);
    }
  }
  return grouped;
}

export class SqliteLedgerStore implements LedgerStore {
  private db: LedgerDatabase;

  constructor(db: LedgerDatabase) {
    this.db = db;
  }

  async load(): Promise<LedgerSnapshot> {
    const settings = new Map(
      this.db
        .select()
        .from(ledgerSettings)
        .all()
        .map((s): [string, string] => [s.key, s.value])
    );

    const version = settings.get(VERSION_KEY);
    if (version === undefined) {
      return emptySnapshot();
    }

    const groupRows = this.db.select().from(ledgerGroups).orderBy(asc(ledgerGroups.position)).all();
    const memberRows = groupBy(
      this.db.select().from(groupMembers).orderBy(asc(groupMembers.position)).all(),
      (m) => m.groupName
    );
    const entryRows = groupBy(
      this.db.select().from(logEntries).orderBy(asc(logEntries.position)).all(),
      (e) => e.groupName
    );
    const changeRows = groupBy(
      this.db.select().from(logChanges).orderBy(asc(logChanges.id)).all(),
      (c) => c.logEntryId
    );

    const groups: GroupSnapshot[] = groupRows.map((group) => ({
      name: group.name,
      currency: CurrencySchema.parse(group.currency),
      members: (memberRows.get(group.name) ?? []).map((m) => ({
        member: m.name,
        balance: m.balance,
      })),
      log: (entryRows.get(group.name) ?? []).map((entry): LogEntry => {
        const change: TransactionChange = {};
        for (const row of changeRows.get(entry.id) ?? []) {
          change[row.memberName] = row.amount;
        }
        return {
          command: LoggedCommandSchema.parse(JSON.parse(entry.command)),
          change,
          createdAt: entry.createdAt,
        };
      }),
    }));

    return {
      version,
      groups,
      currentGroup: settings.get(CURRENT_GROUP_KEY) ?? null,
    };
  }

  /**
   * Replace the stored state with `snapshot` in a single transaction.
   */
  async save(snapshot: LedgerSnapshot): Promise<void> {
    this.db.transaction((tx) => {
      tx.delete(logChanges).run();
      tx.delete(logEntries).run();
      tx.delete(groupMembers).run();
      tx.delete(ledgerGroups).run();
      tx.delete(ledgerSettings).run();

      tx.insert(ledgerSettings).values({ key: VERSION_KEY, value: snapshot.version }).run();
      if (snapshot.currentGroup !== null) {
        tx.insert(ledgerSettings)
          .values({ key: CURRENT_GROUP_KEY, value: snapshot.currentGroup })
          .run();
      }

      snapshot.groups.forEach((group, groupPosition) => {
        tx.insert(ledgerGroups)
          .values({ name: group.name, currency: group.currency, position: groupPosition })
          .run();

        if (group.members.length > 0) {
          tx.insert(groupMembers)
            .values(
              group.members.map((m, position) => ({
                groupName: group.name,
                name: m.member,
                balance: m.balance,
                position,
              }))
            )
            .run();
        }

        group.log.forEach((entry, position) => {
          const [inserted] = tx
            .insert(logEntries)
            .values({
              groupName: group.name,
              position,
              command: JSON.stringify(entry.command),
              createdAt: entry.createdAt,
            })
            .returning({ id: logEntries.id })
            .all();

          const changes = Object.entries(entry.change).map(([memberName, amount]) => ({
            logEntryId: inserted.id,
            memberName,
            amount,
          }));

          if (changes.length > 0) {
            tx.insert(logChanges).values(changes).run();
          }
        });
      });
    });
  }
}
