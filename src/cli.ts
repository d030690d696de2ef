#!/usr/bin/env node
/**
 * CLI for agent-chat-runtime: chat with an agent in the terminal, serve the
 * HTTP API, list agent kinds.
 * Usage: agent-chat <command> [options]
 * Commands: chat | serve | agents
 */

import readline from "node:readline";
import { fileURLToPath } from "node:url";
import { v4 as uuidv4 } from "uuid";
import { createDefaultAgentKinds } from "./agent/AgentKindRegistry.js";
import { AgentService, createAgentService } from "./agent/AgentService.js";
import { loadConfig, type AgentRuntimeConfig } from "./config/AgentConfig.js";
import { errorMessage } from "./core/errors.js";
import { createLogger } from "./observability/Logger.js";
import { startServer } from "./server/server.js";

type Command = "chat" | "serve" | "agents" | "help";

interface CliArgs {
  command: Command;
  configPath?: string;
  agent?: string;
  conversation?: string;
  user?: string;
  port?: number;
  host?: string;
  help: boolean;
  unknown?: string;
}

/** Seams for tests; defaults are the real process streams and services. */
export interface CliDeps {
  input?: NodeJS.ReadableStream;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  createService?: (config: AgentRuntimeConfig) => AgentService;
}

const COMMANDS: readonly Command[] = ["chat", "serve", "agents", "help"];
const EXIT_WORDS = new Set(["exit", "quit", "/exit", "/quit"]);

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function parseArgv(argv: string[]): CliArgs {
  const args = argv.slice(2);
  const parsed: CliArgs = { command: "help", help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      parsed.help = true;
    } else if (arg === "--config" || arg === "-c") {
      parsed.configPath = args[++i];
    } else if (arg === "--agent" || arg === "-a") {
      parsed.agent = args[++i];
    } else if (arg === "--conversation") {
      parsed.conversation = args[++i];
    } else if (arg === "--user") {
      parsed.user = args[++i];
    } else if (arg === "--port" || arg === "-p") {
      const port = Number(args[++i]);
      if (Number.isInteger(port)) parsed.port = port;
    } else if (arg === "--host") {
      parsed.host = args[++i];
    } else if (arg && !arg.startsWith("-")) {
      if (isCommand(arg)) {
        parsed.command = arg;
      } else {
        parsed.unknown = arg;
      }
    }
  }

  return parsed;
}

function printHelp(): void {
  const bin = "agent-chat";
  process.stdout.write(`
Usage: ${bin} <command> [options]

Commands:
  chat     Chat with an agent in the terminal (type "exit" to leave).
  serve    Start the HTTP API.
  agents   List the available agent types.

Options:
  --config, -c <path>    Config file (default: ./agent-runtime.yaml if present).
  --agent, -a <type>     For 'chat': agent type (default: from config).
  --conversation <id>    For 'chat': continue this conversation.
  --user <id>            For 'chat': user id the agent is cached under.
  --port, -p <port>      For 'serve': port (default: from config).
  --host <host>          For 'serve': host (default: from config).
  --help, -h             Show this help.

Examples:
  ${bin} chat --agent customer_service
  ${bin} serve --port 8000
  ${bin} agents
`);
}

function cmdAgents(): number {
  process.stdout.write("type\tdescription\n");
  for (const kind of createDefaultAgentKinds().list()) {
    process.stdout.write(`${kind.kind}\t${kind.description}\n`);
  }
  return 0;
}

async function cmdChat(
  args: CliArgs,
  service: AgentService,
  input: NodeJS.ReadableStream,
): Promise<number> {
  const agentKind = args.agent ?? service.config.defaultAgentKind;
  if (!service.hasAgentKind(agentKind)) {
    process.stderr.write(`Error: unknown agent type "${agentKind}". Run "agent-chat agents".\n`);
    return 1;
  }
  const conversationId = args.conversation ?? uuidv4();
  const agent = service.getAgent(agentKind, args.user);
  process.stdout.write(`${agent.name} (conversation ${conversationId})\n`);
  process.stdout.write(`Type "exit" to leave.\n\n> `);

  const rl = readline.createInterface({ input, terminal: false });
  let failures = 0;
  try {
    for await (const raw of rl) {
      const line = raw.trim();
      if (EXIT_WORDS.has(line.toLowerCase())) break;
      if (line) {
        const events = service.chat({
          agentKind,
          agentId: args.user,
          conversationId,
          message: line,
        });
        for await (const event of events) {
          if (event.type === "content") {
            process.stdout.write(event.text);
          } else if (event.type === "error") {
            failures++;
            process.stderr.write(`\nError (${event.kind}): ${event.message}\n`);
          }
        }
        process.stdout.write("\n");
      }
      process.stdout.write("> ");
    }
  } finally {
    rl.close();
  }
  process.stdout.write("\nGoodbye.\n");
  return failures > 0 ? 1 : 0;
}

async function cmdServe(args: CliArgs, service: AgentService): Promise<number> {
  const logger = createLogger({ level: service.config.logLevel, prefix: "agent-chat" });
  await startServer(service, {
    host: args.host ?? service.config.server.host,
    port: args.port ?? service.config.server.port,
    logger,
  });
  return 0;
}

async function main(argv: string[] = process.argv, deps: CliDeps = {}): Promise<number> {
  const args = parseArgv(argv);

  if (args.help || args.command === "help") {
    printHelp();
    return 0;
  }
  if (args.unknown) {
    process.stderr.write(`Error: unknown command "${args.unknown}"\n`);
    printHelp();
    return 1;
  }
  if (args.command === "agents") {
    return cmdAgents();
  }

  let service: AgentService;
  try {
    const { config } = await loadConfig({
      configPath: args.configPath,
      env: deps.env,
      cwd: deps.cwd,
    });
    service = (deps.createService ?? createAgentService)(config);
  } catch (error) {
    process.stderr.write(`Error: ${errorMessage(error)}\n`);
    return 1;
  }

  if (args.command === "serve") {
    return cmdServe(args, service);
  }
  try {
    return await cmdChat(args, service, deps.input ?? process.stdin);
  } finally {
    await service.shutdown();
  }
}

/** Run CLI with the given argv (same shape as process.argv). Exported for tests. */
export async function run(argv: string[], deps: CliDeps = {}): Promise<number> {
  return main(argv, deps);
}

const isMain =
  typeof process !== "undefined" &&
  process.argv[1] !== undefined &&
  process.argv[1] === fileURLToPath(import.meta.url);

if (isMain) {
  main()
    .then((code) => {
      // serve keeps running until a signal closes it
      if (parseArgv(process.argv).command !== "serve") process.exit(code);
    })
    .catch((err: unknown) => {
      process.stderr.write(errorMessage(err) + "\n");
      process.exit(1);
    });
}
