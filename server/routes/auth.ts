import type { Request, RequestHandler, Response } from "express";
import { z } from "zod";
import type {
  AuthLoginResponse,
  AuthMeResponse,
  Principal,
} from "@shared/api";
import { authenticate, invalidateToken, resolvePrincipal } from "../store/auth";
import { parseBody } from "../utils/parse-body";
import { respondError, route } from "../utils/respond";

const loginSchema = z.object({
  username: z.string().min(1, "Missing credentials"),
  password: z.string().min(1, "Missing credentials"),
});

export const loginHandler: RequestHandler = route("auth", async (req, res) => {
  const { username, password } = parseBody(loginSchema, req.body);
  const result = await authenticate(username, password);
  if (!result) {
    respondError(res, 401, "Invalid credentials or inactive user");
    return;
  }
  const body: AuthLoginResponse = result;
  res.json(body);
});

export const meHandler: RequestHandler = route("auth", async (req, res) => {
  const principal = await resolvePrincipal(requestToken(req));
  const body: AuthMeResponse = {
    user: principal?.user ?? null,
    clientId: principal?.kind === "client" ? principal.clientId : null,
  };
  res.json(body);
});

export const logoutHandler: RequestHandler = route("auth", async (req, res) => {
  const token = requestToken(req);
  if (token) await invalidateToken(token);
  res.status(204).end();
});

function getTokenFromHeader(auth?: string) {
  if (!auth) return null;
  const [type, token] = auth.split(" ");
  if (type !== "Bearer") return null;
  return token ?? null;
}

export function extractToken(auth?: string, queryToken?: string) {
  if (queryToken) return queryToken;
  return getTokenFromHeader(auth);
}

function requestToken(req: Request) {
  const queryToken = typeof req.query.token === "string" ? req.query.token : undefined;
  return extractToken(req.headers.authorization, queryToken);
}

async function requirePrincipal(req: Request, res: Response): Promise<Principal | null> {
  const principal = await resolvePrincipal(requestToken(req));
  if (!principal) {
    respondError(res, 401, "Unauthorized");
    return null;
  }
  return principal;
}

export async function requireAdmin(req: Request, res: Response) {
  const principal = await requirePrincipal(req, res);
  if (!principal) return null;
  switch (principal.kind) {
    case "admin":
      return principal;
    case "client":
      respondError(res, 403, "Admin access required");
      return null;
  }
}

export async function requireClient(req: Request, res: Response) {
  const principal = await requirePrincipal(req, res);
  if (!principal) return null;
  switch (principal.kind) {
    case "client":
      return principal;
    case "admin":
      respondError(res, 403, "Client access required");
      return null;
  }
}
