import { inspect } from "node:util";
import { Severity, type OutgoingMessage } from "../types.js";

const STACK_INDENT = " ".repeat(8);

/**
 * JSON of the original request, or its inspected form when it cannot be serialized
 */
export function formatRequest(payload: unknown): string {
  try {
    const json = JSON.stringify(payload);
    if (json !== undefined) {
      return json;
    }
  } catch {
    // falls through to inspect
  }
  return inspect(payload, { depth: null, breakLength: Infinity });
}

function describeError(error: unknown): { description: string; stack: string } {
  if (error instanceof Error) {
    return {
      description: error.message || error.name,
      stack: error.stack ?? `${error.name}: ${error.message}`,
    };
  }
  const description = String(error);
  return {
    description,
    stack: new Error(description).stack ?? description,
  };
}

function indent(text: string): string {
  return text
    .split("\n")
    .map((line) => `${STACK_INDENT}${line}`)
    .join("\n");
}

/**
 * Error-severity message describing a failed request
 */
export function buildErrorReport(
  error: unknown,
  payload: unknown,
  requestId: string
): OutgoingMessage {
  const { description, stack } = describeError(error);

  const text = [
    `*Exception in firehose notifier:* ${description}`,
    `*Request:* ${requestId}`,
    `*Original message:* ${formatRequest(payload)}`,
    `*Stacktrace:*`,
    indent(stack),
  ].join("\n");

  return { text, severity: Severity.ERROR };
}
