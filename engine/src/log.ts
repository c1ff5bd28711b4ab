import { isDebugEnabled } from "./config.js";

type Details = Record<string, unknown>;

export function debug(scope: string, message: string, details?: Details): void {
  if (!isDebugEnabled()) return;
  if (details) console.debug(`[geonav:${scope}] ${message}`, details);
  else console.debug(`[geonav:${scope}] ${message}`);
}
