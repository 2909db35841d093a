#!/usr/bin/env node
import fs from "fs";
import path from "path";
import dotenv from "dotenv";

function loadEnv(): void {
  const explicitPath = process.env.DOTENV_CONFIG_PATH;
  if (explicitPath) {
    dotenv.config({ path: explicitPath });
    return;
  }

  const cwd = process.cwd();
  const candidates = [path.join(cwd, ".env"), path.join(cwd, "..", ".env")];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      dotenv.config({ path: candidate });
      return;
    }
  }

  dotenv.config();
}

loadEnv();

import { loadSettings } from "../config/settings.js";
import { ConsoleLogger } from "../logger.js";
import { createServices, type Services } from "../rag/services.js";
import { createProgram } from "./program.js";

export async function main(argv: string[]): Promise<void> {
  const settings = loadSettings();
  const logger = new ConsoleLogger(settings.logLevel);

  let services: Services | undefined;
  const program = createProgram(() => (services ??= createServices(settings, logger)));
  await program.parseAsync(argv);
}

try {
  await main(process.argv);
} catch (err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${message}\n`);
  process.exitCode = 1;
}
