/**
 * ddp-donate: validate, extract and donate data download packages.
 */
import { randomUUID } from "node:crypto";

import { parseConfig, type Config } from "./config.js";
import { createLogger, EventSink, type Logger } from "./core/logger.js";
import { runSession, type SessionHost } from "./core/session.js";
import { DonationFlow, type FileLoader, type FlowState } from "./core/workflow.js";
import { getPlatformDefinition } from "./providers/registry.js";
import type { StorageBackend } from "./storage/backend.js";

export { ConfigSchema, parseConfig, type Config } from "./config.js";
export * from "./core/commands.js";
export * from "./core/exceptions.js";
export * from "./core/types.js";
export type { BareFile } from "./core/archive.js";
export { classify, validateArchive, type ValidationProfile } from "./core/classifier.js";
export { findAll, findFirst, flatten, type FlattenedTree } from "./core/flatten.js";
export { createLogger, EventSink, isLogLevel, type LogLevel, type Logger } from "./core/logger.js";
export { runSession, type SessionHost } from "./core/session.js";
export {
  DonationFlow,
  type DonationFlowOptions,
  type FileLoader,
  type FlowState,
  type OutcomeRecord,
  type PlatformOutcome,
  type Step,
} from "./core/workflow.js";
export { Platform, PLATFORM_REGISTRY, getPlatformDefinition } from "./providers/registry.js";
export type { StorageBackend } from "./storage/backend.js";
export { DiskStorage } from "./storage/disk.js";

export interface DDPDonateOptions {
  loadFile?: FileLoader;
  logger?: Logger;
}

export class DDPDonate {
  readonly config: Config;
  private storage: StorageBackend;
  private loadFile: FileLoader | undefined;
  private logger: Logger;

  constructor(config: Config, storage: StorageBackend, opts: DDPDonateOptions = {}) {
    this.config = config;
    this.storage = storage;
    this.loadFile = opts.loadFile;
    this.logger = opts.logger ?? createLogger({ level: config.logLevel });
  }

  /** Construct from a configuration object (validated with zod). */
  static fromConfig(raw: unknown, opts: DDPDonateOptions = {}): DDPDonate {
    const { config, storage } = parseConfig(raw);
    return new DDPDonate(config, storage, opts);
  }

  /** A fresh flow over the configured platforms. */
  createFlow(sessionId: string = randomUUID()): DonationFlow {
    const sink = this.config.donateLogs ? new EventSink() : undefined;
    return new DonationFlow({
      sessionId,
      platforms: this.config.platforms.map(getPlatformDefinition),
      matchRule: this.config.matchRule,
      rowCap: this.config.tableRowCap,
      loadFile: this.loadFile,
      // With log donation on, the session needs its own logger feeding the sink
      logger: sink ? undefined : this.logger,
      logLevel: this.config.logLevel,
      sink,
    });
  }

  /** Persist one donate command under `<key>.json`. */
  async store(key: string, json: string): Promise<void> {
    await this.storage.write(`${key}.json`, json);
  }

  /** Keys of every donation in storage, sorted. */
  async storedKeys(): Promise<string[]> {
    return this.storage.list("");
  }

  /**
   * Run a whole session. Donations go to the configured storage; everything
   * else is left to the host.
   */
  async run(host: Omit<SessionHost, "donate">, sessionId?: string): Promise<FlowState> {
    const flow = this.createFlow(sessionId);
    return runSession(flow, {
      render: (page) => host.render(page),
      donate: (key, json) => this.store(key, json),
      status: host.status ? (key, message) => host.status?.(key, message) : undefined,
      exit: host.exit ? (code, info) => host.exit?.(code, info) : undefined,
    });
  }
}
