#!/usr/bin/env tsx
/**
 * CLI entry point for bsp-tiler.
 *
 * Usage:
 *   bsp-tiler replay <script.json> [--width 1920] [--height 1080] [--x 0] [--y 0] [--log-level info] [--check]
 */

import { readFileSync } from "fs";
import { Command, InvalidArgumentError } from "commander";
import {
  createConsoleDiagnostics,
  formatAssignment,
  isLogLevel,
  LayoutEngine,
  loadConfig,
  LOG_LEVELS,
  parseScript,
  replay,
  type LogLevel,
  type Rect,
  type ReplayScript,
} from "./lib";

interface ReplayCommandOptions {
  x?: number;
  y?: number;
  width?: number;
  height?: number;
  logLevel?: LogLevel;
  check?: boolean;
}

function toNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) throw new InvalidArgumentError("Not a number.");
  return n;
}

function toLogLevel(value: string): LogLevel {
  const level = value.toLowerCase();
  if (!isLogLevel(level)) throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(", ")}.`);
  return level;
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

const program = new Command();

program
  .name("bsp-tiler")
  .description(`${LayoutEngine.layoutName} tiling layout`)
  .version("0.1.0");

program
  .command("replay")
  .description("Replay a JSON script of window events and print the resulting frames")
  .argument("<file>", "Path to the replay script")
  .option("--x <number>", "Screen origin x", toNumber)
  .option("--y <number>", "Screen origin y", toNumber)
  .option("--width <number>", "Screen width", toNumber)
  .option("--height <number>", "Screen height", toNumber)
  .option("--log-level <level>", "info, warn, error or silent", toLogLevel)
  .option("--check", "Verify the tree invariant after replay")
  .action((file: string, opts: ReplayCommandOptions) => {
    const config = loadConfig();
    const diagnostics = createConsoleDiagnostics({ prefix: "bsp", level: opts.logLevel ?? config.logLevel });

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(file, "utf-8"));
    } catch (err) {
      fail(`could not read ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }

    let script: ReplayScript;
    try {
      script = parseScript(raw);
    } catch (err) {
      fail(err instanceof Error ? err.message : String(err));
    }

    const base: Rect = script.screen ?? config.screen;
    const screen: Rect = {
      x: opts.x ?? base.x,
      y: opts.y ?? base.y,
      width: opts.width ?? base.width,
      height: opts.height ?? base.height,
    };

    const result = replay(script, { screen, diagnostics });

    for (const assignment of result.assignments) {
      console.log(formatAssignment(assignment));
    }
    console.log(`order: ${result.order.join(" ")}`);
    if (result.focused !== null) {
      console.log(`next: ${result.next ?? "-"}`);
      console.log(`previous: ${result.previous ?? "-"}`);
    }

    if (opts.check) {
      const problems = result.engine.tree.validate();
      for (const problem of problems) console.error(`invalid tree: ${problem}`);
      if (problems.length > 0) process.exit(1);
    }
  });

program.parse();
