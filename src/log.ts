let debugEnabled = false;

export function setDebug(enabled: boolean) {
  debugEnabled = enabled;
}

export function isDebug() {
  return debugEnabled;
}

export function debug(...args: unknown[]) {
  if (!debugEnabled) return;
  console.log("🐞", ...args);
}
