import { ACP_DEBUG_LOG } from "./env.js";

export type TracePayload = Record<string, unknown>;

export function traceLog(tag: string, message: string, payload?: TracePayload): void {
  if (!ACP_DEBUG_LOG) return;
  if (payload) {
    console.log(`[${tag}] ${message}`, payload);
  } else {
    console.log(`[${tag}] ${message}`);
  }
}

export function warnLog(tag: string, message: string, payload?: TracePayload): void {
  if (payload) {
    console.warn(`[${tag}] ${message}`, payload);
  } else {
    console.warn(`[${tag}] ${message}`);
  }
}
