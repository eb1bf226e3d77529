export type Command = "ingest" | "ask" | "delete" | "formats" | "list";

export type ParsedCli = {
  command: Command;
  args: string[];
  options: {
    format?: string;
    json: boolean;
    includeTickets?: boolean;
    includeKb?: boolean;
    category?: string;
  };
};

const USAGE = [
  "Usage:",
  "  supportbrain ingest [--format <format>] <file...>",
  "  supportbrain ask [--json] [--no-tickets] [--no-kb] [--category <name>] <question>",
  "  supportbrain delete <documentId>",
  "  supportbrain formats",
  "  supportbrain list"
].join("\n");

function isCommand(value: string | undefined): value is Command {
  return (
    value === "ingest" ||
    value === "ask" ||
    value === "delete" ||
    value === "formats" ||
    value === "list"
  );
}

export function parseCli(argv: string[]): ParsedCli {
  const [, , command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new Error(USAGE);
  }

  const args: string[] = [];
  const options: ParsedCli["options"] = { json: false };
  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i] ?? "";
    if (arg === "--json") {
      options.json = true;
    } else if (arg === "--no-tickets") {
      options.includeTickets = false;
    } else if (arg === "--no-kb") {
      options.includeKb = false;
    } else if (arg === "--format" || arg === "--category") {
      const value = rest[i + 1];
      if (!value) throw new Error(USAGE);
      if (arg === "--format") options.format = value;
      else options.category = value;
      i += 1;
    } else {
      args.push(arg);
    }
  }
  return { command, args, options };
}
