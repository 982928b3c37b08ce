#!/usr/bin/env -S npx tsx

import { createRequire } from "node:module";
import { Command } from "commander";
import { registerConfigCommand } from "../src/commands/config.js";
import { registerProxyListCommand } from "../src/commands/proxy-list.js";
import { registerRegionsCommand } from "../src/commands/regions.js";
import { registerRunCommand } from "../src/commands/run.js";
import { registerUploadCommand } from "../src/commands/upload.js";

const require = createRequire(import.meta.url);
const pkg: unknown = require("../package.json");
const version =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

const program = new Command();

program
  .name("edgeprobe")
  .description("Find the fastest edge IPs and publish them to a preferred-IP registry or repository")
  .version(version);

registerRunCommand(program);
registerUploadCommand(program);
registerRegionsCommand(program);
registerProxyListCommand(program);
registerConfigCommand(program);
await program.parseAsync();
