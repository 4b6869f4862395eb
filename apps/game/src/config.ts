/* The stage also runs in the browser, where there is no process */
const env: Record<string, string | undefined> = typeof process === "undefined" ? {} : process.env;

/** Unset or unparsable values leave the game settings in charge. */
function numberFromEnv(name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

export const config = {
  logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === "test" ? "silent" : "info"),
  pixelScale: numberFromEnv("PIXEL_SCALE"),
  moveSpeed: numberFromEnv("MOVE_SPEED"),
};
