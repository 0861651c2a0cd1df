import type { InjectionToken } from "@scopebound/types";

export function tokenToString(token: InjectionToken): string {
  if (typeof token === "function") return token.name;
  return String(token);
}
