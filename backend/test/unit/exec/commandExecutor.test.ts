import { describe, it, expect } from "@jest/globals";
import fs from "fs";
import os from "os";
import { ChildProcessExecutor, LAUNCH_FAILURE_CODE, maskCommand } from "../../../src/exec/commandExecutor";
import { createCapturingLogger } from "../../__support__/fakes";

const node = process.execPath;

describe("ChildProcessExecutor", () => {
  it("captures stdout and trims trailing whitespace", async () => {
    const executor = new ChildProcessExecutor(createCapturingLogger());
    const result = await executor.execute([node, "-e", "process.stdout.write('hello world  \\n\\n')"]);

    expect(result).toEqual({ code: 0, stdout: "hello world", stderr: "" });
  });

  it("returns a non-zero exit code with stderr instead of rejecting", async () => {
    const executor = new ChildProcessExecutor(createCapturingLogger());
    const result = await executor.execute([node, "-e", "process.stderr.write('boom\\n'); process.exit(3)"]);

    expect(result).toEqual({ code: 3, stdout: "", stderr: "boom" });
  });

  it("folds a missing program into the launch-failure code", async () => {
    const executor = new ChildProcessExecutor(createCapturingLogger());
    const result = await executor.execute(["tenant-orchestrator-no-such-binary"]);

    expect(result.code).toBe(LAUNCH_FAILURE_CODE);
    expect(result.stdout).toBe("");
    expect(result.stderr).toContain("ENOENT");
  });

  it("kills the process on timeout and reports it", async () => {
    const executor = new ChildProcessExecutor(createCapturingLogger());
    const started = Date.now();
    const result = await executor.execute([node, "-e", "setTimeout(() => {}, 20000)"], { timeoutMs: 300 });

    expect(result.code).toBe(LAUNCH_FAILURE_CODE);
    expect(result.stderr).toBe("command timed out after 300ms");
    expect(Date.now() - started).toBeLessThan(10000);
  });

  it("rejects an empty command without spawning", async () => {
    const executor = new ChildProcessExecutor(createCapturingLogger());
    await expect(executor.execute([])).resolves.toEqual({
      code: LAUNCH_FAILURE_CODE,
      stdout: "",
      stderr: "empty command"
    });
  });

  it("runs in the requested working directory", async () => {
    const dir = fs.realpathSync(fs.mkdtempSync(`${os.tmpdir()}/exec-cwd-`));
    const executor = new ChildProcessExecutor(createCapturingLogger());
    const result = await executor.execute([node, "-e", "process.stdout.write(process.cwd())"], { cwd: dir });

    expect(result.code).toBe(0);
    expect(fs.realpathSync(result.stdout)).toBe(dir);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("masks redacted values in the logged command line", async () => {
    const logger = createCapturingLogger();
    const executor = new ChildProcessExecutor(logger);
    await executor.execute([node, "-e", "0", "--", "--from-literal=root-password=test-secret"], {
      redact: ["test-secret"]
    });

    const runLine = logger.lines.find(l => l.message.startsWith("RUN CMD:"));
    expect(runLine?.message).toBe(`RUN CMD: ${node} -e 0 -- --from-literal=root-password=*** (cwd=)`);
  });
});

describe("maskCommand", () => {
  it("replaces every occurrence of each secret", () => {
    expect(maskCommand(["kubectl", "--from-literal=a=abc", "--from-literal=b=xyz"], ["abc", "xyz"])).toBe(
      "kubectl --from-literal=a=*** --from-literal=b=***"
    );
  });

  it("ignores empty secrets", () => {
    expect(maskCommand(["helm", "list"], [""])).toBe("helm list");
  });
});
