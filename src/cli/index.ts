#!/usr/bin/env node
import "dotenv/config";
import * as readline from "node:readline";
import { ConfigStore } from "../config/index.js";
import { CommandLauncher } from "../core/launcher/commandLauncher.js";
import { SystemClipboard } from "../integrations/clipboard/systemClipboard.js";
import { TerminalSpotlight } from "../ui/terminalSpotlight.js";

async function main(): Promise<void> {
  const config = new ConfigStore();
  const settings = await config.load();

  console.log("═══════════════════════════════════════════════════════");
  console.log("  cmdlight – AI command launcher");
  console.log("═══════════════════════════════════════════════════════");
  console.log(`  Provider: ${settings.provider}`);
  console.log(`  Model:    ${settings.model}`);
  console.log(`  Hotkey:   ${settings.hotkey}  (Esc hides, "exit" or Ctrl+C quits)`);
  console.log(`  Config:   ${config.filePath}`);
  if (settings.control_port > 0) {
    console.log(`  Control:  http://127.0.0.1:${settings.control_port}`);
  }
  console.log("───────────────────────────────────────────────────────\n");

  const stdin = process.stdin;
  readline.emitKeypressEvents(stdin);
  if (stdin.isTTY) {
    stdin.setRawMode(true);
  } else {
    console.warn("⚠️  stdin is not a terminal – the hotkey will not work");
  }
  stdin.resume();

  const launcher = new CommandLauncher({
    config,
    surface: new TerminalSpotlight(stdin, process.stdout),
    keySource: stdin,
    clipboard: new SystemClipboard(),
  });

  process.once("SIGTERM", () => {
    launcher.quit().catch((error: unknown) => {
      console.error(error);
    });
  });

  await launcher.start();
  launcher.show();
  await launcher.closed;

  if (stdin.isTTY) stdin.setRawMode(false);
  stdin.pause();
  process.stdout.write("\n");
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`\n❌ cmdlight failed: ${message}`);
  process.exit(1);
});
