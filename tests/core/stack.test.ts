import { describe, expect, test } from "vitest";
import { StackController } from "../../src/core/stack";
import type { ComposeRunner } from "../../src/types";
import { ToolFailedError } from "../../src/utils/errors";
import type { CommandResult } from "../../src/utils/exec";

class FakeCompose implements ComposeRunner {
  readonly calls: string[][] = [];

  constructor(private readonly respond: (args: string[]) => Partial<CommandResult> = () => ({})) {}

  async run(args: string[]): Promise<CommandResult> {
    this.calls.push(args);
    const answer = this.respond(args);
    const exitCode = answer.exitCode ?? 0;
    return { success: exitCode === 0, stdout: answer.stdout ?? "", stderr: answer.stderr ?? "", exitCode };
  }
}

const PS_RUNNING = JSON.stringify({ Service: "n8n", Name: "n8n-1", State: "running", Status: "Up", Health: "" });

describe("StackController", () => {
  test("quiesce stops every service", async () => {
    const compose = new FakeCompose();
    await new StackController(compose).quiesce();
    expect(compose.calls).toEqual([["stop"]]);
  });

  test("resume brings the stack up detached", async () => {
    const compose = new FakeCompose();
    await new StackController(compose).resume();
    expect(compose.calls).toEqual([["up", "-d", "--remove-orphans"]]);
  });

  test("isRunning is true when any service runs", async () => {
    expect(await new StackController(new FakeCompose(() => ({ stdout: "n8n\n" }))).isRunning()).toBe(true);
    expect(await new StackController(new FakeCompose(() => ({ stdout: "\n" }))).isRunning()).toBe(false);
    expect(await new StackController(new FakeCompose()).isRunning()).toBe(false);
  });

  test("runningServices filters by state without JSON output", async () => {
    const compose = new FakeCompose(() => ({ stdout: "n8n\npostgres\n" }));
    expect(await new StackController(compose).runningServices()).toEqual(["n8n", "postgres"]);
    expect(compose.calls).toEqual([["ps", "--services", "--filter", "status=running"]]);
  });

  test("isRunning fails when compose ps fails", async () => {
    const compose = new FakeCompose(() => ({ exitCode: 1, stderr: "no such option: --format" }));
    await expect(new StackController(compose).isRunning()).rejects.toBeInstanceOf(ToolFailedError);
  });

  test("status asks compose for every container as JSON", async () => {
    const compose = new FakeCompose(() => ({ stdout: PS_RUNNING }));
    const services = await new StackController(compose).status();
    expect(compose.calls).toEqual([["ps", "--all", "--format", "json"]]);
    expect(services.map((s) => s.service)).toEqual(["n8n"]);
  });

  test("failures carry the compose step and exit code", async () => {
    const compose = new FakeCompose(() => ({ exitCode: 1, stderr: "no configuration file provided" }));
    const error = await new StackController(compose).quiesce().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolFailedError);
    if (!(error instanceof ToolFailedError)) return;
    expect(error.step).toBe("compose stop");
    expect(error.exitCode).toBe(1);
  });
});
