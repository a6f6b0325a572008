import type { VercelRequest } from "@vercel/node";
import { config } from "dotenv";

let envLoaded = false;

/** Load `.env` once per warm instance; platform variables take precedence. */
export function loadEnv(): void {
  if (envLoaded) return;
  config();
  envLoaded = true;
}

export function verifyCronSecret(
  req: Pick<VercelRequest, "headers">,
  cronSecret: string | undefined = process.env.CRON_SECRET
): boolean {
  // In development, allow requests without secret
  if (!cronSecret) {
    return true;
  }

  return req.headers.authorization === `Bearer ${cronSecret}`;
}
