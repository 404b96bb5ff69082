declare global {
  // eslint-disable-next-line no-var
  var __TABLE_STITCHER_DEBUG__: boolean | undefined;
}

export type DebugLogger = (...args: unknown[]) => void;

export function debugEnabled(): boolean {
  if (globalThis.__TABLE_STITCHER_DEBUG__ === true) return true;
  if (typeof process !== 'undefined' && process.env?.TABLE_STITCHER_DEBUG === '1') return true;
  return false;
}

export function createDebugLogger(scope: string): DebugLogger {
  return (...args: unknown[]) => {
    if (!debugEnabled()) return;
    console.log(`[table-stitcher:${scope}]`, ...args);
  };
}
