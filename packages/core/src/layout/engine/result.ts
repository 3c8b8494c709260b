import type { LayoutFatalCode, LayoutResult } from "../validateProps.js";

export function ok<T>(value: T): LayoutResult<T> {
  return { ok: true, value };
}

export function fatal(code: LayoutFatalCode, detail: string): LayoutResult<never> {
  return { ok: false, fatal: { code, detail } };
}
