/**
 * Drive a donation flow to completion against a host.
 */
import type { Page, Payload } from "./commands.js";
import type { DonationFlow, FlowState } from "./workflow.js";

export interface SessionHost {
  /** Show a page and resolve with the participant's answer. */
  render(page: Page): Promise<Payload>;
  donate(key: string, json: string): void | Promise<void>;
  status?(key: string, message: string): void;
  exit?(code: number, info: string): void;
}

/** Runs until the flow finishes and returns the final state. */
export async function runSession(
  flow: DonationFlow,
  host: SessionHost,
): Promise<FlowState> {
  let step = flow.start();

  for (;;) {
    let pending: Page | null = null;
    for (const command of step.commands) {
      switch (command.kind) {
        case "render":
          pending = command.page;
          break;
        case "donate":
          await host.donate(command.key, command.json);
          break;
        case "status":
          host.status?.(command.key, command.message);
          break;
        case "exit":
          host.exit?.(command.code, command.info);
          break;
      }
    }

    if (step.state.tag === "FINISHED") {
      if (pending) await host.render(pending);
      return step.state;
    }
    if (!pending) {
      throw new Error(`Flow suspended in ${step.state.tag} without a page to render`);
    }

    step = await flow.advance(step.state, await host.render(pending));
  }
}
