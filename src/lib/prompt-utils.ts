import prompts, { type PromptObject } from "prompts";

/**
 * Thrown when the user presses Ctrl+C or Esc at a prompt
 */
export class PromptCancelledError extends Error {
  constructor() {
    super("Cancelled");
    this.name = "PromptCancelledError";
  }
}

/**
 * Prompts only make sense when someone is watching stdout
 */
export function isInteractive(): boolean {
  return process.stdout.isTTY === true;
}

async function ask(question: PromptObject<"value">): Promise<unknown> {
  let cancelled = false;
  const response = await prompts(question, {
    onCancel: () => {
      cancelled = true;
      return false;
    },
  });
  if (cancelled) {
    throw new PromptCancelledError();
  }
  const value: unknown = response.value;
  return value;
}

/**
 * Ask for a line of text.
 *
 * Resolves to undefined without a terminal, so callers can fall back to
 * command-line options.
 */
export async function promptText(
  message: string,
  initial?: string,
  validate?: (value: string) => boolean | string,
): Promise<string | undefined> {
  if (!isInteractive()) {
    return undefined;
  }

  const value = await ask({
    type: "text",
    name: "value",
    message,
    initial,
    validate,
  });
  return typeof value === "string" ? value : undefined;
}

export async function promptSelect<T extends string>(
  message: string,
  choices: readonly T[],
): Promise<T | undefined> {
  if (!isInteractive()) {
    return undefined;
  }

  const value = await ask({
    type: "select",
    name: "value",
    message,
    choices: choices.map((choice) => ({ title: choice, value: choice })),
    initial: 0,
  });
  return choices.find((choice) => choice === value);
}
