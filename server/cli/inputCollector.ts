export type ChatCommand = "exit" | "save" | "clear";

export type LineReader = () => Promise<string | null>;

export type CollectedInput =
  | { kind: "command"; command: ChatCommand }
  | { kind: "message"; text: string }
  | { kind: "empty" }
  | { kind: "closed" };

const TERMINATOR = "###";

export function parseChatCommand(line: string): ChatCommand | null {
  const normalized = line.trim().toLowerCase();
  if (normalized === "exit" || normalized === "save" || normalized === "clear") {
    return normalized;
  }
  return null;
}

/**
 * Reads one user entry. A first line ending in `###` is a complete message;
 * otherwise lines are gathered until one that is exactly `###`. A null line
 * means the input closed (EOF or interrupt) and drops whatever was gathered.
 */
export async function collectInput(readLine: LineReader): Promise<CollectedInput> {
  const first = await readLine();
  if (first === null) {
    return { kind: "closed" };
  }

  const firstLine = first.trim();
  const command = parseChatCommand(firstLine);
  if (command) {
    return { kind: "command", command };
  }

  let text: string;
  if (firstLine.endsWith(TERMINATOR)) {
    text = firstLine.slice(0, -TERMINATOR.length).trim();
  } else {
    const lines = [firstLine];
    while (true) {
      const line = await readLine();
      if (line === null) {
        return { kind: "closed" };
      }
      if (line.trim() === TERMINATOR) {
        break;
      }
      lines.push(line);
    }
    text = lines.join("\n");
  }

  return text.trim() ? { kind: "message", text } : { kind: "empty" };
}
