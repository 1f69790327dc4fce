import { loadConfig } from "../config.js";
import { BalanceService, ExpenseService, GroupService } from "../services/index.js";
import { MemoryLedgerStore, SqliteLedgerStore, openDatabase, type LedgerStore } from "../storage/index.js";
import { createApp } from "./app.js";

const config = loadConfig();

const store: LedgerStore =
  config.storage === "memory"
    ? new MemoryLedgerStore()
    : new SqliteLedgerStore(openDatabase(config.databasePath));

const app = createApp({
  groupService: new GroupService(store, config.defaultCurrency),
  expenseService: new ExpenseService(store),
  balanceService: new BalanceService(store),
});

app.listen(config.port, () => {
  console.log(`🌐 Tally API running on http://localhost:${config.port}`);
  console.log(`💾 Storage: ${config.storage === "memory" ? "in-memory" : config.databasePath}`);
});
