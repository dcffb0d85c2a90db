export const DEBUG_ENV = 'NBCACHE_DEBUG';

export function debugEnabled(envVar = DEBUG_ENV): boolean {
  const flag = process.env[envVar];
  return !!flag && flag !== '0' && flag.toLowerCase() !== 'false';
}

export function debugLog(tag: string, message: string): void {
  if (!debugEnabled()) return;
  // eslint-disable-next-line no-console
  console.log(`[${tag}] ${message}`);
}
