#!/usr/bin/env node
import { Command } from "commander";
import fs from "fs";
import path from "path";
import { registerDiscoverCommand } from "./commands/discover";
import { registerContextCommand } from "./commands/file-context";
import { registerListCommand } from "./commands/list";
import { registerRegisterCommand } from "./commands/register";
import { registerSearchCommand } from "./commands/search";
import { registerSimilarCommand } from "./commands/similar";
import { registerStatusCommand } from "./commands/status";
import { registerSyncCommand } from "./commands/sync";
import { registerUnregisterCommand } from "./commands/unregister";
import { registerWatchCommand } from "./commands/watch";

function readPackageVersion(): string {
  try {
    const pkgPath = path.join(__dirname, "..", "package.json");
    const parsed: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

async function main() {
  const program = new Command();
  program
    .name("vecsync")
    .description("Keep semantic indexes of local project trees in sync with the filesystem")
    .version(readPackageVersion());

  registerRegisterCommand(program);
  registerUnregisterCommand(program);
  registerDiscoverCommand(program);
  registerListCommand(program);
  registerSyncCommand(program);
  registerStatusCommand(program);
  registerSearchCommand(program);
  registerContextCommand(program);
  registerSimilarCommand(program);
  registerWatchCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(message);
  process.exit(1);
});
