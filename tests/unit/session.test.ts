import { describe, it, expect, afterEach } from "vitest";
import { readFile } from "fs/promises";
import { join } from "path";
import { openSession, type ToolSession } from "../../src/runner/session.js";
import { BridgeError, SessionNotRunningError, TimeoutError, ToolReportedError } from "../../src/errors.js";
import { EnvironmentBridge } from "../../src/runner/bridge.js";
import { makeTempDir, nodeToolHandle, removeDir } from "../helpers/fixtures.js";

const handle = nodeToolHandle("fake-layout-tool.mjs");

let session: ToolSession | null = null;

async function open(args: string[] = [], transcriptPath?: string, startupSettleMs = 100): Promise<ToolSession> {
  session = await openSession(handle, { args, startupSettleMs, transcriptPath, toolName: "magic" });
  return session;
}

afterEach(async () => {
  await session?.close();
  session = null;
});

describe("ToolSession", () => {
  it("starts running and returns the trimmed reply line", async () => {
    const s = await open();

    expect(s.status).toBe("running");
    expect(s.pid).toBeTypeOf("number");
    expect(await s.send("box 0 0 10 10", 5_000)).toBe("ok: box 0 0 10 10");
  });

  it("returns an empty reply instead of timing out", async () => {
    const s = await open();

    expect(await s.send("blank", 5_000)).toBe("");
    expect(s.status).toBe("running");
  });

  it("raises the stderr line as a tool error and keeps running", async () => {
    const s = await open();

    const failure = s.send("bad command", 5_000);
    await expect(failure).rejects.toBeInstanceOf(ToolReportedError);
    await expect(failure).rejects.toMatchObject({ details: "Unknown command: bad command" });

    expect(s.status).toBe("running");
    expect(await s.send("paint metal1", 5_000)).toBe("ok: paint metal1");
  });

  it("kills a silent tool and stays dead afterwards", async () => {
    const s = await open();

    await expect(s.send("hang", 300)).rejects.toBeInstanceOf(TimeoutError);
    expect(s.status).toBe("dead");

    const started = Date.now();
    await expect(s.send("box", 5_000)).rejects.toBeInstanceOf(SessionNotRunningError);
    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it("marks the session dead when the tool exits mid-command", async () => {
    const s = await open();

    await expect(s.send("crash", 5_000)).rejects.toBeInstanceOf(SessionNotRunningError);
    expect(s.status).toBe("dead");
  });

  it("serves concurrent sends one at a time, in call order", async () => {
    const s = await open();

    const replies = await Promise.all([s.send("slow one", 5_000), s.send("box", 5_000)]);

    expect(replies).toEqual(["done", "ok: box"]);
  });

  it("ignores start-up output that arrived before the first command", async () => {
    // Long enough for the banner to be on the pipe before the first send
    const s = await open(["--banner"], undefined, 1_500);

    expect(await s.send("box", 5_000)).toBe("ok: box");
  });

  it("closes idempotently and refuses sends afterwards", async () => {
    const s = await open();

    await s.close();
    await s.close();

    expect(s.status).toBe("closed");
    await expect(s.send("box", 1_000)).rejects.toBeInstanceOf(SessionNotRunningError);
  });

  it("closes quietly after the tool has died", async () => {
    const s = await open();
    await expect(s.send("crash", 5_000)).rejects.toBeInstanceOf(SessionNotRunningError);

    await expect(s.close()).resolves.toBeUndefined();
    expect(s.status).toBe("dead");
  });

  it("appends each exchange to the transcript", async () => {
    const dir = await makeTempDir("transcript");
    try {
      const transcript = join(dir, "magic.log");
      const s = await open([], transcript);

      await s.send("box", 5_000);
      await expect(s.send("bad", 5_000)).rejects.toBeInstanceOf(ToolReportedError);

      expect(await readFile(transcript, "utf-8")).toBe(
        "Command: box\nOutput: ok: box\nError: \n---\n" + "Command: bad\nOutput: \nError: Unknown command: bad\n---\n"
      );
    } finally {
      await removeDir(dir);
    }
  });

  it("fails to open when the executable is missing", async () => {
    await expect(
      openSession({ executablePath: "/nonexistent/magic", requiresBridge: false, verified: false }, {})
    ).rejects.toMatchObject({ kind: "ProcessStartFailure" });
  });

  it("fails with a bridge error when the bridge cannot start", async () => {
    const bridge = new EnvironmentBridge({
      bridgeMode: "always",
      bridgeCommand: "/nonexistent/wsl",
      bridgeShell: "bash",
      mountPrefix: "/mnt",
    });
    const bridged = { executablePath: "D:\\tools\\magic", requiresBridge: true, verified: true };

    const error = await openSession(bridged, { args: ["-noconsole"], bridge }).then(
      () => null,
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(BridgeError);
    expect(error).toMatchObject({ kind: "BridgeFailure" });
  });
});
