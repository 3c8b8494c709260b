/**
 * packages/core/src/debug/devWarnings.ts — Development-only warnings.
 *
 * Warnings go to `console.warn` when one exists and are silent under
 * NODE_ENV=production. The environment is read through globalThis so this
 * package stays free of Node-specific imports.
 */

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";

export const DEV_MODE = NODE_ENV !== "production";

export function warnDev(message: string): void {
  if (!DEV_MODE) return;
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}
