/**
 * Auth and error shapes shared by the API and its consumers.
 */

export type Role = "admin" | "client";

export interface User {
  id: string;
  username: string;
  name: string;
  email: string;
  role: Role;
  active: boolean;
}

/**
 * Who is calling. Admin capabilities and client-scoped reads are decided by
 * switching on `kind`, never by inspecting the role string in handlers.
 */
export type Principal =
  | { kind: "admin"; user: User }
  | { kind: "client"; user: User; clientId: string };

export interface AuthLoginRequest {
  username: string;
  password: string;
}

export interface AuthLoginResponse {
  token: string;
  user: User;
}

export interface AuthMeResponse {
  user: User | null;
  clientId: string | null;
}

export interface ApiError {
  error: string;
  details?: unknown;
}
