export { GroupService, type LogListing } from "./GroupService.js";
export { ExpenseService } from "./ExpenseService.js";
export { BalanceService } from "./BalanceService.js";
