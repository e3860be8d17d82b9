import { Hono } from "hono";
import type { Context, Next } from "hono";

import {
  AccountNotFoundError,
  RequestQuickMatch,
  SessionNotFoundError,
  SessionRejection,
  WAITING_MESSAGE,
  isOpen,
  isValidAccountId,
  winRate,
  type Account,
  type AccountGateway,
  type Command,
  type CommandContext,
  type Logger,
  type SessionGateway,
  type SessionState,
  type TimePoint,
} from "./core.js";

type DispatchCommand = <TResult>(
  command: Command<TResult>,
  context: CommandContext,
) => Promise<TResult>;

export const MATCH_FOUND_MESSAGE = "Match found!";
const MAX_NAME_LENGTH = 32;

export interface CreateServerAppOptions {
  readonly port: number;
  readonly sessionGateway: SessionGateway;
  readonly accountGateway: AccountGateway;
  readonly logger: Logger;
  readonly createContext: () => CommandContext;
  readonly dispatch: DispatchCommand;
  readonly clock?: () => TimePoint;
}

export interface AccountView extends Account {
  readonly winRate: number;
}

export function toAccountView(account: Account): AccountView {
  return { ...account, winRate: winRate(account) };
}

/** Moves stay hidden until the session has ended. */
export function toSessionView(state: SessionState): Omit<SessionState, "moveA" | "moveB"> {
  if (!isOpen(state.status)) {
    return state;
  }
  const { moveA: _moveA, moveB: _moveB, ...visible } = state;
  return visible;
}

export function createServerApp({
  port,
  sessionGateway,
  accountGateway,
  logger,
  createContext,
  dispatch,
  clock = Date.now,
}: CreateServerAppOptions): Hono {
  const app = new Hono();

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.get("/api/health", (c: Context) =>
    c.json({ ok: true, timestamp: clock(), config: { port } }),
  );

  app.post("/api/accounts", async (c: Context) => {
    const body: unknown = await c.req.json().catch(() => null);
    const name = readField(body, "name");

    if (typeof name !== "string" || name.trim().length === 0) {
      return c.json({ error: "name is required" }, 400);
    }
    if (name.trim().length > MAX_NAME_LENGTH) {
      return c.json({ error: `name must be at most ${MAX_NAME_LENGTH} characters` }, 400);
    }

    const account = await accountGateway.createAccount(name.trim(), clock());
    logger.info("Account created", { accountId: account.id });
    return c.json(toAccountView(account), 201);
  });

  app.get("/api/accounts/:id", async (c: Context) => {
    const accountId = Number(c.req.param("id"));
    if (!isValidAccountId(accountId)) {
      return c.json({ error: "account id must be a positive integer" }, 400);
    }

    try {
      const account = await accountGateway.loadAccount(accountId);
      return c.json(toAccountView(account));
    } catch (error) {
      logger.warn("Failed to load account", { accountId, error });
      return c.json(errorBody(error), statusFor(error));
    }
  });

  app.get("/api/leaderboard", async (c: Context) => {
    const search = c.req.query("search");
    const accounts = await accountGateway.listLeaderboard(search);
    return c.json({ accounts: accounts.map(toAccountView) });
  });

  app.post("/api/quick-match", async (c: Context) => {
    const body: unknown = await c.req.json().catch(() => null);
    const accountId = readField(body, "accountId");

    if (!isValidAccountId(accountId)) {
      return c.json({ error: "accountId must be a positive integer" }, 400);
    }

    try {
      const { session, matched } = await dispatch(
        new RequestQuickMatch(accountId, clock()),
        createContext(),
      );
      return c.json({
        sessionId: session.id,
        status: matched ? "matched" : "waiting",
        message: matched ? MATCH_FOUND_MESSAGE : WAITING_MESSAGE,
      });
    } catch (error) {
      logger.warn("Quick match failed", { accountId, error });
      return c.json(errorBody(error), statusFor(error));
    }
  });

  app.get("/api/sessions/:id", async (c) => {
    const sessionId = c.req.param("id");
    try {
      const state = await sessionGateway.loadSession(sessionId);
      return c.json(toSessionView(state));
    } catch (error) {
      logger.warn("Failed to load session", { sessionId, error });
      return c.json(errorBody(error), statusFor(error));
    }
  });

  return app;
}

function readField(body: unknown, field: string): unknown {
  if (typeof body !== "object" || body === null) return undefined;
  return field in body ? Reflect.get(body, field) : undefined;
}

function statusFor(error: unknown): 400 | 404 | 500 {
  if (error instanceof AccountNotFoundError || error instanceof SessionNotFoundError) {
    return 404;
  }
  if (error instanceof SessionRejection) {
    return 400;
  }
  return 500;
}

function errorBody(error: unknown): { readonly error: string; readonly code?: string } {
  if (error instanceof SessionRejection) {
    return { error: error.message, code: error.code };
  }
  return { error: "Internal server error" };
}
