import type { ToolCall } from "@warden/agent-runtime-core";

const PROMPT_PREVIEW_CHARS = 80;
const JSON_PREVIEW_CHARS = 120;

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function readString(args: unknown, ...keys: string[]): string | undefined {
  if (typeof args !== "object" || args === null || Array.isArray(args)) {
    return undefined;
  }
  for (const key of keys) {
    const value: unknown = Reflect.get(args, key);
    if (typeof value === "string") {
      return value;
    }
  }
  return undefined;
}

/**
 * Short text shown to the human deciding an approval: the command for shell
 * tools, the path for file writes, the query for searches, a prompt preview
 * for agent spawns and compact JSON otherwise.
 */
export function summarizeToolCall(call: ToolCall): string {
  const args = call.arguments;

  const command = readString(args, "command", "cmd");
  if (command !== undefined) {
    return `${call.name}: ${command}`;
  }

  const path = readString(args, "file_path", "path");
  if (path !== undefined) {
    return `${call.name}: ${path}`;
  }

  const query = readString(args, "query");
  if (query !== undefined) {
    return `${call.name}: ${query}`;
  }

  const prompt = readString(args, "prompt");
  if (prompt !== undefined) {
    return `${call.name}: ${truncate(prompt, PROMPT_PREVIEW_CHARS)}`;
  }

  const json = args === undefined ? (call.rawArguments ?? "") : JSON.stringify(args);
  return `${call.name} ${truncate(json, JSON_PREVIEW_CHARS)}`;
}
