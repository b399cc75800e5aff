const report = (failed: number) => ({
  statuses: {},
  runs: [
    {
      site: { name: "alpha", url: "https://alpha.example.org/", downloadDir: "/data/alpha", forceRedownload: false },
      outcome: failed > 0 ? { status: "failed", stage: "upload", code: "upload_partial", message: "x" } : { status: "succeeded" }
    },
    {
      site: { name: "beta", url: "https://beta.example.org/", downloadDir: "/data/beta", forceRedownload: false },
      outcome: { status: "succeeded" }
    }
  ],
  succeeded: 2 - failed,
  failed
});

describe("backup CLI", () => {
  const envSnapshot = { ...process.env };

  afterEach(() => {
    process.env = { ...envSnapshot };
    jest.dontMock("../../src/composition/root");
    jest.resetModules();
    jest.restoreAllMocks();
  });

  const mockExit = () =>
    jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

  it("builds a controlled error envelope without stack by default", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/backup");

    const error = Object.assign(new Error("Site #1: missing required field \"url\""), {
      name: "ConfigError",
      code: "config_invalid",
      context: { index: 1, field: "url", unsafe: "ignored" },
      cause: { raw: "secret payload" }
    });

    const envelope = buildCliErrorEnvelope(error, false);

    expect(envelope).toEqual({
      event: "backup.failed",
      name: "ConfigError",
      message: "Site #1: missing required field \"url\"",
      code: "config_invalid",
      context: { index: 1, field: "url" }
    });
    expect(JSON.stringify(envelope)).not.toContain("secret payload");
  });

  it("includes stack only when debug mode is enabled", async () => {
    const { buildCliErrorEnvelope, isDebugMode } = await import("../../src/cli/backup");

    expect(buildCliErrorEnvelope(new Error("boom"), true).stack).toContain("Error: boom");
    expect(buildCliErrorEnvelope("boom", false)).toEqual({ event: "backup.failed", name: "Error", message: "boom" });
    expect(isDebugMode({ DEBUG: "TRUE" })).toBe(true);
    expect(isDebugMode({ DEBUG: "0" })).toBe(false);
  });

  it("reads the config path from --config or the first argument", async () => {
    const { parseCliArgs } = await import("../../src/cli/backup");

    expect(parseCliArgs(["--config", "sites.json"])).toEqual({ configPath: "sites.json" });
    expect(parseCliArgs(["-c", "a.json"])).toEqual({ configPath: "a.json" });
    expect(parseCliArgs(["b.json"])).toEqual({ configPath: "b.json" });
    expect(parseCliArgs([])).toEqual({});
  });

  it("prints usage and exits with code 2 without a config path", async () => {
    const runBackups = jest.fn();
    jest.doMock("../../src/composition/root", () => ({ runBackups }));
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const exitSpy = mockExit();

    const { executeBackupCli } = await import("../../src/cli/backup");
    await expect(executeBackupCli([])).rejects.toThrow("EXIT:2");

    expect(errorSpy).toHaveBeenCalledWith("Usage: website-backups <sites.json> | --config <sites.json>");
    expect(exitSpy).toHaveBeenCalledWith(2);
    expect(runBackups).not.toHaveBeenCalled();
  });

  it("prints one summary line per site and exits normally when all succeed", async () => {
    const runBackups = jest.fn().mockResolvedValue(report(0));
    jest.doMock("../../src/composition/root", () => ({ runBackups }));
    const logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    const exitSpy = mockExit();

    const { executeBackupCli } = await import("../../src/cli/backup");
    await executeBackupCli(["sites.json"]);

    expect(runBackups).toHaveBeenCalledWith("sites.json");
    expect(logSpy.mock.calls).toEqual([["alpha: Succeeded"], ["beta: Succeeded"]]);
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it("exits with code 1 when any site failed", async () => {
    jest.doMock("../../src/composition/root", () => ({ runBackups: jest.fn().mockResolvedValue(report(1)) }));
    const logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    mockExit();

    const { executeBackupCli } = await import("../../src/cli/backup");
    await expect(executeBackupCli(["--config", "sites.json"])).rejects.toThrow("EXIT:1");

    expect(logSpy.mock.calls).toEqual([["alpha: Failed(upload)"], ["beta: Succeeded"]]);
  });

  it("logs a sanitized envelope and exits with code 1 on a fatal error", async () => {
    process.env = { ...envSnapshot, DEBUG: "0" };
    const runBackups = jest.fn().mockRejectedValue(
      Object.assign(new Error("Cannot read site list /etc/sites.json"), {
        name: "ConfigError",
        code: "config_invalid",
        context: { source: "/etc/sites.json" },
        cause: { huge: "do-not-print-this" }
      })
    );
    jest.doMock("../../src/composition/root", () => ({ runBackups }));
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const exitSpy = mockExit();

    const { executeBackupCli } = await import("../../src/cli/backup");
    await expect(executeBackupCli(["/etc/sites.json"])).rejects.toThrow("EXIT:1");

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0]))).toEqual({
      event: "backup.failed",
      name: "ConfigError",
      message: "Cannot read site list /etc/sites.json",
      code: "config_invalid",
      context: { source: "/etc/sites.json" }
    });
    expect(exitSpy).toHaveBeenCalledWith(1);
  });
});
