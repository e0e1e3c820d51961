import { config as loadDotEnv } from "dotenv";

let loaded = false;

export function ensureEnvLoaded(): void {
  if (loaded) {
    return;
  }

  loadDotEnv({ path: ".env.local" });
  loadDotEnv();
  loaded = true;
}
