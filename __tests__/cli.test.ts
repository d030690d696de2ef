import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import { run, type CliDeps } from "../src/cli.js";
import { AgentService } from "../src/agent/AgentService.js";
import { InMemoryHistoryStore } from "../src/history/InMemoryHistoryStore.js";
import { ScriptedCompletionClient, reply, type ScriptStep } from "./fixtures/index.js";

/** Run CLI programmatically (no dist/cli.js needed). Captures stdout/stderr. */
async function runCli(
  args: string[],
  deps: CliDeps = {},
): Promise<{ stdout: string; stderr: string; code: number }> {
  const stdoutChunks: string[] = [];
  const stderrChunks: string[] = [];
  const stdoutWrite = vi.spyOn(process.stdout, "write").mockImplementation((chunk) => {
    stdoutChunks.push(String(chunk));
    return true;
  });
  const stderrWrite = vi.spyOn(process.stderr, "write").mockImplementation((chunk) => {
    stderrChunks.push(String(chunk));
    return true;
  });
  try {
    const code = await run(["node", "cli", ...args], deps);
    return {
      stdout: stdoutChunks.join(""),
      stderr: stderrChunks.join(""),
      code,
    };
  } finally {
    stdoutWrite.mockRestore();
    stderrWrite.mockRestore();
  }
}

describe("agent-chat CLI", () => {
  let cwd: string;
  let history: InMemoryHistoryStore;

  const scripted = (steps: ScriptStep[], lines: string[]): CliDeps => ({
    cwd,
    env: { AGENT_LOG_LEVEL: "silent" },
    input: Readable.from(lines),
    createService: (config) =>
      new AgentService({ config, history, client: new ScriptedCompletionClient(steps) }),
  });

  beforeEach(async () => {
    cwd = await mkdtemp(path.join(tmpdir(), "agent-cli-"));
    history = new InMemoryHistoryStore();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(cwd, { recursive: true, force: true });
  });

  it("prints help with --help", async () => {
    const { stdout, code } = await runCli(["--help"]);
    expect(code).toBe(0);
    expect(stdout).toContain("Usage: agent-chat <command> [options]");
    expect(stdout).toContain("  chat     Chat with an agent in the terminal");
    expect(stdout).toContain("  serve    Start the HTTP API.");
  });

  it("prints help with no args", async () => {
    const { stdout, code } = await runCli([]);
    expect(code).toBe(0);
    expect(stdout).toContain("Usage:");
  });

  it("lists agent types", async () => {
    const { stdout, code } = await runCli(["agents"]);
    expect(code).toBe(0);
    expect(stdout).toBe(
      "type\tdescription\n" +
        "customer_service\tSupport agent: FAQ search, ticket creation and ticket updates\n",
    );
  });

  it("rejects an unknown command", async () => {
    const { stderr, code } = await runCli(["deploy"]);
    expect(code).toBe(1);
    expect(stderr).toBe('Error: unknown command "deploy"\n');
  });

  it("chats until exit and persists the exchange", async () => {
    const { stdout, stderr, code } = await runCli(
      ["chat", "--conversation", "conv-1"],
      scripted([reply("Hello", "!")], ["hello\n", "exit\n"]),
    );

    expect(code).toBe(0);
    expect(stderr).toBe("");
    expect(stdout).toBe(
      "Customer Service Agent (conversation conv-1)\n" +
        'Type "exit" to leave.\n\n> ' +
        "Hello!\n> " +
        "\nGoodbye.\n",
    );
    const stored = await history.getMessages("conv-1");
    expect(stored.map((m) => [m.role, m.content])).toEqual([
      ["user", "hello"],
      ["assistant", "Hello!"],
    ]);
  });

  it("reports a failed turn and exits with 1", async () => {
    const { stderr, code } = await runCli(
      ["chat", "--conversation", "conv-1"],
      scripted([[{ type: "failed", reason: "upstream 500" }]], ["hello\n"]),
    );

    expect(code).toBe(1);
    expect(stderr).toBe("\nError (MODEL_CALL_FAILED): Model call failed: upstream 500\n");
  });

  it("rejects an unknown agent type for chat", async () => {
    const { stderr, code } = await runCli(
      ["chat", "--agent", "sales"],
      scripted([], []),
    );
    expect(code).toBe(1);
    expect(stderr).toBe('Error: unknown agent type "sales". Run "agent-chat agents".\n');
  });

  it("reads the config file named by --config", async () => {
    await writeFile(path.join(cwd, "bad.yaml"), "engine:\n  maxToolIterations: 0\n");
    const { stderr, code } = await runCli(["chat", "--config", "bad.yaml"], scripted([], []));
    expect(code).toBe(1);
    expect(stderr).toBe(
      "Error: Invalid configuration: engine.maxToolIterations: Number must be greater than 0\n",
    );
  });

  it("fails on a missing config file", async () => {
    const { stderr, code } = await runCli(["chat", "--config", "missing.yaml"], scripted([], []));
    expect(code).toBe(1);
    expect(stderr).toBe(
      `Error: Cannot read config file ${path.join(cwd, "missing.yaml")}: ` +
        `ENOENT: no such file or directory, open '${path.join(cwd, "missing.yaml")}'\n`,
    );
  });
});
