#!/usr/bin/env node

import { Command } from "commander";
import { loadSettings } from "./config/loader.js";
import { fuseFiles } from "./commands/fuse.js";
import { validateManifest } from "./commands/validate.js";
import { EXIT } from "./commands/exit-codes.js";
import { writeErrors, type OutputFormat } from "./commands/output.js";
import { setLogLevel } from "./log.js";
import type { PortwireSettings } from "./types/config.js";

type GlobalOpts = { config: string; env?: string; format: OutputFormat };

const program = new Command();

program
  .name("portwire")
  .description("Validate adapter manifests and fuse ranked results")
  .version("0.1.0")
  .option("--config <path>", "Path to settings directory", "config")
  .option("--env <name>", "Settings environment layer (loads <config>/<env>.yaml)")
  .option("--format <format>", "Output format: human|jsonl", "human");

async function settingsOrExit(opts: GlobalOpts): Promise<PortwireSettings> {
  const res = await loadSettings(opts.env, opts.config);
  if (!res.ok) {
    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "error", code: "SETTINGS_INVALID", message: res.error }) + "\n");
    } else {
      console.error(`Settings invalid: ${res.error}`);
    }
    process.exit(EXIT.SETTINGS_INVALID);
  }
  setLogLevel(res.value.log_level);
  return res.value;
}

program
  .command("validate")
  .description("Load and validate a manifest (env placeholders expanded, defaults filled)")
  .argument("[manifest]", "Manifest path (defaults to settings manifest_path)")
  .action(async (manifest: string | undefined) => {
    const opts = program.opts<GlobalOpts>();
    const settings = await settingsOrExit(opts);
    const res = await validateManifest({ manifestPath: manifest ?? settings.manifest_path });

    if (!res.ok) {
      writeErrors(res.errors, opts.format);
      process.exit(EXIT.MANIFEST_INVALID);
    }

    if (opts.format === "jsonl") {
      for (const d of res.diagnostics) process.stdout.write(JSON.stringify(d) + "\n");
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
    } else {
      for (const d of res.diagnostics) console.log(d.message);
      console.log("OK");
    }
  });

program
  .command("show")
  .description("Print the validated manifest as JSON")
  .argument("[manifest]", "Manifest path (defaults to settings manifest_path)")
  .action(async (manifest: string | undefined) => {
    const opts = program.opts<GlobalOpts>();
    const settings = await settingsOrExit(opts);
    const res = await validateManifest({ manifestPath: manifest ?? settings.manifest_path });

    if (!res.ok) {
      writeErrors(res.errors, opts.format);
      process.exit(EXIT.MANIFEST_INVALID);
    }

    const indent = opts.format === "jsonl" ? undefined : 2;
    process.stdout.write(JSON.stringify(res.manifest, null, indent) + "\n");
  });

program
  .command("fuse")
  .description("Fuse two JSON arrays of ranked search results with reciprocal rank fusion")
  .argument("<listA>", "First ranked list (JSON array)")
  .argument("<listB>", "Second ranked list (JSON array)")
  .option("--k <number>", "Rank offset", parseFloat)
  .option("--weight-a <number>", "Weight for the first list", parseFloat)
  .option("--weight-b <number>", "Weight for the second list", parseFloat)
  .action(async (listA: string, listB: string, cmdOpts: { k?: number; weightA?: number; weightB?: number }) => {
    const opts = program.opts<GlobalOpts>();
    const settings = await settingsOrExit(opts);

    const res = await fuseFiles({
      listA,
      listB,
      k: cmdOpts.k ?? settings.fusion?.k,
      weightA: cmdOpts.weightA ?? settings.fusion?.weight_a,
      weightB: cmdOpts.weightB ?? settings.fusion?.weight_b,
    });

    if (!res.ok) {
      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify({ level: "error", code: "INPUT_INVALID", message: res.error }) + "\n");
      } else {
        console.error(res.error);
      }
      process.exit(EXIT.INPUT_INVALID);
    }

    if (opts.format === "jsonl") {
      for (const r of res.results) process.stdout.write(JSON.stringify(r) + "\n");
    } else {
      for (const r of res.results) console.log(`${r.id}  ${r.score.toFixed(5)}`);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
