/**
 * The donation flow: one explicit state machine per participant session.
 *
 * The flow never blocks on the host. `start` and `advance` return the next
 * state together with the commands to deliver; every step that does not end
 * the session closes with exactly one render command, and the host's answer
 * to it is the payload of the next `advance` call.
 */
import { readFile } from "node:fs/promises";

import { validateArchive } from "./classifier.js";
import {
  consentForm,
  donate,
  exit,
  promptFile,
  renderEndPage,
  renderPage,
  retryConfirmation,
  status,
  type Command,
  type Payload,
  type StatusCommand,
  type StatusMessage,
} from "./commands.js";
import { ExtractionPipeline, type PlatformDefinition } from "./etl.js";
import { SessionClosedError } from "./exceptions.js";
import {
  createLogger,
  describeError,
  type EventSink,
  type LogLevel,
  type Logger,
} from "./logger.js";
import { makeNoDataTable } from "./table.js";
import type { ExtractionResult, MatchRule, RecognizedValidation } from "./types.js";

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export type PlatformOutcome = "donated" | "skipped" | "declined";

export interface OutcomeRecord {
  platform: string;
  outcome: PlatformOutcome;
}

interface StateBase {
  /** One entry per platform already behind the participant. */
  outcomes: readonly OutcomeRecord[];
}

export type FlowState =
  | (StateBase & { tag: "PROMPT_FILE"; platformIndex: number })
  | (StateBase & { tag: "RETRY_CONFIRM"; platformIndex: number })
  | (StateBase & {
      tag: "REVIEW_CONSENT";
      platformIndex: number;
      extraction: ExtractionResult;
    })
  | (StateBase & { tag: "FINISHED" });

export interface Step {
  state: FlowState;
  commands: Command[];
}

export type FileLoader = (ref: string) => Promise<Uint8Array>;

export interface DonationFlowOptions {
  sessionId: string;
  platforms: readonly PlatformDefinition[];
  matchRule?: MatchRule;
  rowCap?: number;
  /** Resolves the host's file reference to bytes. Defaults to a disk read. */
  loadFile?: FileLoader;
  /** Used as given; a sink only sees its lines if this logger writes to it. */
  logger?: Logger;
  logLevel?: LogLevel;
  /**
   * Captures the session's log lines. When set, they are donated as
   * `<sessionId>-tracking` and `<sessionId>-<platform>-tracking`.
   */
  sink?: EventSink;
}

export const DEFAULT_ROW_CAP = 250_000;

async function readFromDisk(ref: string): Promise<Uint8Array> {
  return new Uint8Array(await readFile(ref));
}

// ---------------------------------------------------------------------------
// Flow
// ---------------------------------------------------------------------------

export class DonationFlow {
  readonly sessionId: string;
  private platforms: readonly PlatformDefinition[];
  private matchRule: MatchRule;
  private rowCap: number;
  private loadFile: FileLoader;
  private sink: EventSink | undefined;
  private log: Logger;

  constructor(opts: DonationFlowOptions) {
    this.sessionId = opts.sessionId;
    this.platforms = opts.platforms;
    this.matchRule = opts.matchRule ?? "any";
    this.rowCap = opts.rowCap ?? DEFAULT_ROW_CAP;
    this.loadFile = opts.loadFile ?? readFromDisk;
    this.sink = opts.sink;
    const root = opts.logger ?? createLogger({ level: opts.logLevel, sink: opts.sink });
    this.log = root.child({ sessionId: opts.sessionId });
  }

  start(): Step {
    const commands: Command[] = [];
    this.log.info("Starting the donation flow");
    this.donateLogs(commands);
    return this.enterPrompt(0, [], commands);
  }

  async advance(state: FlowState, response: Payload): Promise<Step> {
    switch (state.tag) {
      case "PROMPT_FILE":
        return this.onFile(state.platformIndex, state.outcomes, response);
      case "RETRY_CONFIRM":
        return this.onRetry(state.platformIndex, state.outcomes, response);
      case "REVIEW_CONSENT":
        return this.onConsent(state.platformIndex, state.outcomes, state.extraction, response);
      case "FINISHED":
        throw new SessionClosedError(this.sessionId);
    }
  }

  // -------------------------------------------------------------------------
  // Transitions
  // -------------------------------------------------------------------------

  private enterPrompt(
    index: number,
    outcomes: readonly OutcomeRecord[],
    commands: Command[],
  ): Step {
    const platform = this.platforms[index];
    if (!platform) {
      this.log.info({ outcomes }, "Donation flow finished");
      commands.push(exit(0, "Success"), renderEndPage());
      return { state: { tag: "FINISHED", outcomes }, commands };
    }

    this.logFor(platform).info(`Prompt for file for ${platform.name}`);
    this.donateLogs(commands, platform);
    commands.push(
      renderPage(platform.name, promptFile(platform.acceptedTypes, platform.name)),
    );
    return { state: { tag: "PROMPT_FILE", platformIndex: index, outcomes }, commands };
  }

  private async onFile(
    index: number,
    outcomes: readonly OutcomeRecord[],
    response: Payload,
  ): Promise<Step> {
    const platform = this.platformAt(index);
    const log = this.logFor(platform);
    const commands: Command[] = [];

    if (response.kind !== "string") {
      log.info(`Skipped at file selection ${platform.name}`);
      this.donateLogs(commands, platform);
      commands.push(this.statusFor(platform, "SKIP_FILE_PROMPT"));
      return this.nextPlatform(index, outcomes, platform, "skipped", commands);
    }

    log.info(`Payload for ${platform.name}`);
    const validation = await this.validate(response.value, platform, log);

    if (!validation.recognized) {
      log.info(`Invalid ${platform.name} file; prompt retry_confirmation`);
      this.donateLogs(commands, platform);
      commands.push(
        this.statusFor(platform, "INVALID_FILE"),
        renderPage(platform.name, retryConfirmation(platform.name)),
      );
      return {
        state: { tag: "RETRY_CONFIRM", platformIndex: index, outcomes },
        commands,
      };
    }

    const extraction = await this.extract(validation.data, validation.result, platform, log);
    return this.enterReview(index, outcomes, extraction, commands);
  }

  private onRetry(
    index: number,
    outcomes: readonly OutcomeRecord[],
    response: Payload,
  ): Step {
    const platform = this.platformAt(index);
    const commands: Command[] = [];

    if (response.kind === "true") return this.enterPrompt(index, outcomes, commands);

    this.logFor(platform).info(`Skipped during retry ${platform.name}`);
    this.donateLogs(commands, platform);
    commands.push(this.statusFor(platform, "SKIP_RETRY"));
    return this.nextPlatform(index, outcomes, platform, "skipped", commands);
  }

  private enterReview(
    index: number,
    outcomes: readonly OutcomeRecord[],
    extraction: ExtractionResult,
    commands: Command[],
  ): Step {
    const platform = this.platformAt(index);
    const log = this.logFor(platform);
    const tables = [...extraction.tables];

    if (tables.length === 0) {
      log.info(`No data found for ${platform.name}`);
      commands.push(this.statusFor(platform, "NO_DATA_FOUND"));
      tables.push(makeNoDataTable(platform.name));
    }

    log.info(`Prompt consent; ${platform.name}`);
    this.donateLogs(commands, platform);
    commands.push(renderPage(platform.name, consentForm(tables)));
    return {
      state: { tag: "REVIEW_CONSENT", platformIndex: index, outcomes, extraction },
      commands,
    };
  }

  private onConsent(
    index: number,
    outcomes: readonly OutcomeRecord[],
    extraction: ExtractionResult,
    response: Payload,
  ): Step {
    const platform = this.platformAt(index);
    const log = this.logFor(platform);
    const commands: Command[] = [];

    if (response.kind !== "json") {
      log.info(`Skipped ${platform.name}`);
      this.donateLogs(commands, platform);
      commands.push(this.statusFor(platform, "SKIP_REVIEW_CONSENT"));
      return this.nextPlatform(index, outcomes, platform, "declined", commands);
    }

    const capped = extraction.cappedDonations;
    if (capped !== null) {
      for (const [key, rows] of Object.entries(capped)) {
        commands.push(donate(`${platform.name}_${key}`, JSON.stringify({ [key]: rows })));
      }
    } else {
      commands.push(donate(platform.name, JSON.stringify(response.value)));
    }
    log.info(`Data donated; ${platform.name}`);
    this.donateLogs(commands, platform);
    commands.push(this.statusFor(platform, "DONATED"));
    return this.nextPlatform(index, outcomes, platform, "donated", commands);
  }

  private nextPlatform(
    index: number,
    outcomes: readonly OutcomeRecord[],
    platform: PlatformDefinition,
    outcome: PlatformOutcome,
    commands: Command[],
  ): Step {
    return this.enterPrompt(
      index + 1,
      [...outcomes, { platform: platform.name, outcome }],
      commands,
    );
  }

  // -------------------------------------------------------------------------
  // Transient phases
  // -------------------------------------------------------------------------

  private async validate(
    ref: string,
    platform: PlatformDefinition,
    log: Logger,
  ): Promise<
    | { recognized: true; data: Uint8Array; result: RecognizedValidation }
    | { recognized: false }
  > {
    let data: Uint8Array;
    try {
      data = await this.loadFile(ref);
    } catch (err) {
      log.error(`Could not load file: ${describeError(err)}`);
      return { recognized: false };
    }

    const result = validateArchive(data, platform, this.matchRule, log);
    log.info({ status: result.status.id }, result.status.description);
    if (!result.recognized) return { recognized: false };
    return { recognized: true, data, result };
  }

  private async extract(
    data: Uint8Array,
    validation: RecognizedValidation,
    platform: PlatformDefinition,
    log: Logger,
  ): Promise<ExtractionResult> {
    const pipeline = new ExtractionPipeline({
      extraction: new platform.extraction(),
      rowCap: this.rowCap,
      bareFile: platform.bareFile,
    });
    try {
      return await pipeline.run(data, validation, log);
    } catch (err) {
      log.error(describeError(err));
      return { tables: [], cappedDonations: null };
    }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private platformAt(index: number): PlatformDefinition {
    const platform = this.platforms[index];
    if (!platform) throw new RangeError(`No platform at position ${index}`);
    return platform;
  }

  private logFor(platform: PlatformDefinition): Logger {
    return this.log.child({ platform: platform.name });
  }

  private statusFor(platform: PlatformDefinition, message: StatusMessage): StatusCommand {
    const key = `${this.sessionId}-${platform.name}-${message.replace(/_/g, "-")}`;
    return status(key, message);
  }

  private donateLogs(commands: Command[], platform?: PlatformDefinition): void {
    if (!this.sink) return;
    const key = platform
      ? `${this.sessionId}-${platform.name}-tracking`
      : `${this.sessionId}-tracking`;
    const lines = this.sink.lines();
    commands.push(donate(key, JSON.stringify(lines.length > 0 ? lines : ["no logs"])));
  }
}
