import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { BalanceService, ExpenseService, GroupService } from "../services/index.js";
import { errorHandler } from "./errors.js";
import {
  AddMembersBodySchema,
  ApplySettlementBodySchema,
  CreateExpenseBodySchema,
  CreateGroupBodySchema,
  CreatePaymentBodySchema,
  RemoveMembersBodySchema,
  UndoBodySchema,
} from "./schemas.js";

export interface ApiServices {
  groupService: GroupService;
  expenseService: ExpenseService;
  balanceService: BalanceService;
}

type Handler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error handler
function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export function createApp({ groupService, expenseService, balanceService }: ApiServices): Express {
  const app = express();

  app.use(express.json());

  // Health check
  app.get("/health", (req, res) => {
    res.json({ status: "ok", message: "Tally API" });
  });

  app.get(
    "/groups",
    route(async (req, res) => {
      res.json(await groupService.listGroups());
    })
  );

  app.post(
    "/groups",
    route(async (req, res) => {
      const body = CreateGroupBodySchema.parse(req.body);
      res.status(201).json(await groupService.createGroup(body.name, body.members, body.currency));
    })
  );

  app.get(
    "/groups/:group",
    route(async (req, res) => {
      res.json(await groupService.getStats(req.params.group));
    })
  );

  app.delete(
    "/groups/:group",
    route(async (req, res) => {
      await groupService.deleteGroup(req.params.group);
      res.status(204).end();
    })
  );

  app.post(
    "/groups/:group/members",
    route(async (req, res) => {
      const body = AddMembersBodySchema.parse(req.body);
      res.json(await groupService.addMembers(req.params.group, body.members));
    })
  );

  app.delete(
    "/groups/:group/members",
    route(async (req, res) => {
      const body = RemoveMembersBodySchema.parse(req.body);
      res.json(await groupService.removeMembers(req.params.group, body.members, body.force));
    })
  );

  app.get(
    "/groups/:group/log",
    route(async (req, res) => {
      res.json(await groupService.listLog(req.params.group));
    })
  );

  app.post(
    "/groups/:group/expenses",
    route(async (req, res) => {
      const body = CreateExpenseBodySchema.parse(req.body);
      const change = await expenseService.allocateExpense({
        group: req.params.group,
        amountCents: body.amount,
        from: body.from,
        to: body.to,
        name: body.name,
        balanceRest: body.balanceRest,
      });
      res.status(201).json({ change });
    })
  );

  app.post(
    "/groups/:group/payments",
    route(async (req, res) => {
      const body = CreatePaymentBodySchema.parse(req.body);
      const change = await expenseService.recordPayment({
        group: req.params.group,
        amountCents: body.amount,
        from: body.from,
        to: body.to,
      });
      res.status(201).json({ change });
    })
  );

  app.post(
    "/groups/:group/undo",
    route(async (req, res) => {
      const body = UndoBodySchema.parse(req.body ?? {});
      res.json({ undone: await expenseService.undo(req.params.group, body.index) });
    })
  );

  app.get(
    "/groups/:group/settlement",
    route(async (req, res) => {
      res.json({ transactions: await balanceService.planSettlement(req.params.group) });
    })
  );

  // Confirmation step: the client posts back the transactions it accepted
  app.post(
    "/groups/:group/settlement",
    route(async (req, res) => {
      const body = ApplySettlementBodySchema.parse(req.body);
      const change = await balanceService.applySettlement(req.params.group, body.transactions);
      res.json({ change });
    })
  );

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({ error: "NotFound", message: "Endpoint not found" });
  });

  app.use(errorHandler);

  return app;
}
