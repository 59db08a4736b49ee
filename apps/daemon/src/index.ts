#!/usr/bin/env -S node --import tsx
import { runCli } from "./cli";

async function main() {
  const exitCode = await runCli(process.argv.slice(2), {
    env: process.env,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    onStart: (daemon) => {
      process.once("SIGINT", () => daemon.stop());
      process.once("SIGTERM", () => daemon.stop());
    },
  });
  process.exitCode = exitCode;
}

main().catch((err) => {
  console.error("fwsync failed:", err);
  process.exit(1);
});
