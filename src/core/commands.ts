/**
 * Commands the donation flow sends to its host, and the payloads the host
 * answers render commands with.
 */
import type { Row, Table, Translatable } from "./types.js";

// ---------------------------------------------------------------------------
// Pages
// ---------------------------------------------------------------------------

export interface FileInputPrompt {
  kind: "fileInput";
  description: Translatable;
  /** Accepted MIME types / extensions, comma separated. */
  extensions: string;
}

export interface ConfirmPrompt {
  kind: "confirm";
  text: Translatable;
  ok: Translatable;
  cancel: Translatable;
}

export interface ConsentFormPrompt {
  kind: "consentForm";
  tables: Table[];
  metaTables: Table[];
}

export type PromptBody = FileInputPrompt | ConfirmPrompt | ConsentFormPrompt;

export interface DonationPage {
  kind: "donation";
  platform: string;
  header: { title: Translatable };
  body: PromptBody;
}

export interface EndPage {
  kind: "end";
}

export type Page = DonationPage | EndPage;

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export type StatusMessage =
  | "INVALID_FILE"
  | "SKIP_FILE_PROMPT"
  | "SKIP_RETRY"
  | "NO_DATA_FOUND"
  | "DONATED"
  | "SKIP_REVIEW_CONSENT";

export interface RenderCommand {
  kind: "render";
  page: Page;
}

/** Fire-and-forget; the flow never learns whether it was stored. */
export interface DonateCommand {
  kind: "donate";
  key: string;
  json: string;
}

export interface StatusCommand {
  kind: "status";
  key: string;
  message: StatusMessage;
}

export interface ExitCommand {
  kind: "exit";
  code: number;
  info: string;
}

export type Command = RenderCommand | DonateCommand | StatusCommand | ExitCommand;

// ---------------------------------------------------------------------------
// Host payloads
// ---------------------------------------------------------------------------

export type Payload =
  | { kind: "string"; value: string }
  | { kind: "true" }
  | { kind: "false" }
  | { kind: "json"; value: unknown }
  | { kind: "void" };

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export function renderPage(platform: string, body: PromptBody): RenderCommand {
  return {
    kind: "render",
    page: {
      kind: "donation",
      platform,
      header: { title: { en: platform, nl: platform } },
      body,
    },
  };
}

export function renderEndPage(): RenderCommand {
  return { kind: "render", page: { kind: "end" } };
}

export function promptFile(extensions: string, platform: string): FileInputPrompt {
  return {
    kind: "fileInput",
    description: {
      en: `Please follow the download instructions and choose the file that you stored on your device. Click "Skip" at the right bottom, if you do not have a file from ${platform}.`,
      nl: `Volg de download instructies en kies het bestand dat je opgeslagen hebt op je apparaat. Als je geen ${platform} bestand hebt klik dan op "Overslaan" rechts onder.`,
    },
    extensions,
  };
}

export function retryConfirmation(platform: string): ConfirmPrompt {
  return {
    kind: "confirm",
    text: {
      en: `Unfortunately, we could not process your ${platform} file. If you are sure that you selected the correct file, press Continue. To select a different file, press Try again.`,
      nl: `Helaas, kunnen we je ${platform} bestand niet verwerken. Weet je zeker dat je het juiste bestand hebt gekozen? Ga dan verder. Probeer opnieuw als je een ander bestand wilt kiezen.`,
    },
    ok: { en: "Try again", nl: "Probeer opnieuw" },
    cancel: { en: "Continue", nl: "Verder" },
  };
}

export function consentForm(tables: Table[]): ConsentFormPrompt {
  return { kind: "consentForm", tables, metaTables: [] };
}

export function donate(key: string, json: string): DonateCommand {
  return { kind: "donate", key, json };
}

export function status(key: string, message: StatusMessage): StatusCommand {
  return { kind: "status", key, message };
}

export function exit(code: number, info: string): ExitCommand {
  return { kind: "exit", code, info };
}

/**
 * The value a host sends back when the participant accepts every table of
 * a consent form unchanged.
 */
export function consentPayload(form: ConsentFormPrompt): Payload {
  const value: { name: string; rows: Row[] }[] = form.tables.map((t) => ({
    name: t.name,
    rows: t.rows,
  }));
  return { kind: "json", value };
}
