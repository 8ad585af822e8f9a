#!/usr/bin/env node
/**
 * CLI entrypoint for ddp-donate.
 *
 * Usage:
 *   ddp-donate --youtube ~/takeout.zip --tiktok ~/user_data.json --yes
 */
import { parseArgs } from "node:util";
import {
  consentPayload,
  DDPDonate,
  isLogLevel,
  Platform,
  type Page,
  type Payload,
} from "./index.js";

const USAGE = `
ddp-donate: donate your data download packages

Usage:
  ddp-donate --youtube <takeout.zip>
  ddp-donate --tiktok <export.zip|user_data.json>
  ddp-donate --youtube <y.zip> --tiktok <t.zip> --yes

Options:
  --youtube <path>       YouTube (Google Takeout) export
  --tiktok <path>        TikTok export, ZIP or bare JSON
  --yes                  Consent to donating every extracted table
  --out <dir>            Where donations are written  (default: ./donations)
  --match <rule>         Classification rule, any | majority  (default: any)
  --log-level <level>    pino log level  (default: info)
  --donate-logs          Donate the session log alongside the data
  --help                 Show this help
`.trim();

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    youtube: { type: "string" },
    tiktok: { type: "string" },
    yes: { type: "boolean", short: "y", default: false },
    out: { type: "string", default: "./donations" },
    match: { type: "string", default: "any" },
    "log-level": { type: "string", default: "info" },
    "donate-logs": { type: "boolean", default: false },
    help: { type: "boolean", short: "h", default: false },
  },
  strict: true,
});

if (values.help) {
  console.log(USAGE);
  process.exit(0);
}

const files = new Map<string, string>();
if (values.youtube) files.set(Platform.YouTube, values.youtube);
if (values.tiktok) files.set(Platform.TikTok, values.tiktok);

const logLevel = values["log-level"];
if (files.size === 0 || !isLogLevel(logLevel)) {
  console.error(USAGE);
  process.exit(1);
}

const ddp = DDPDonate.fromConfig({
  platforms: [...files.keys()],
  matchRule: values.match,
  donateLogs: values["donate-logs"],
  logLevel,
  storage: { provider: "disk", config: { basePath: values.out } },
});

/** Each file is offered once; a retry prompt is answered with Continue. */
async function answer(page: Page): Promise<Payload> {
  if (page.kind === "end") return { kind: "void" };

  const key = page.platform.toLowerCase();
  const body = page.body;
  switch (body.kind) {
    case "fileInput": {
      const path = files.get(key);
      files.delete(key);
      if (!path) return { kind: "void" };
      console.log(`Processing ${page.platform} file: ${path}`);
      return { kind: "string", value: path };
    }
    case "confirm":
      return { kind: "false" };
    case "consentForm":
      for (const table of body.tables) {
        console.log(`  ${table.name}: ${table.rows.length} rows`);
      }
      return values.yes ? consentPayload(body) : { kind: "false" };
  }
}

const state = await ddp.run({
  render: answer,
  status: (key, message) => console.log(`  ${message} (${key})`),
});

for (const { platform, outcome } of state.outcomes) {
  console.log(`${platform}: ${outcome}`);
}
const stored = await ddp.storedKeys();
console.log(`\nDone! ${stored.length} donation file(s) in ${values.out}/`);
for (const key of stored) {
  console.log(`  ${key}`);
}
