export const COMMANDS = ["ingest", "retrieve", "ask", "status"] as const;

export type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

export function parseCli(argv: string[]): { command: Command; args: string[] } {
  const [, , command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new Error(`Usage: cardsense <${COMMANDS.join("|")}> [...]`);
  }
  return { command, args: rest };
}

export function questionFrom(args: string[], command: Command): string {
  const question = args.join(" ").trim();
  if (!question) {
    throw new Error(`Usage: cardsense ${command} <question>`);
  }
  return question;
}
