import { describe, it, expect, vi, afterEach } from "vitest";
import { runCli, type CliIo } from "./cli";
import { UndertheseaSegmenter } from "./modules/segmenter/underthesea";
import { log } from "./util/log";

const captureIo = (stdin?: string) => {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIo = {
    stdout: (chunk) => out.push(chunk),
    stderr: (chunk) => err.push(chunk),
    readStdin: async () => stdin,
  };
  return { io, stdout: () => out.join(""), stderr: () => err.join("") };
};

const MISSING_PYTHON = { SEGMENTER_PYTHON_BIN: "/nonexistent/python-for-tests" };

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

describe("runCli", () => {
  it("prints the full pipeline result", async () => {
    const cap = captureIo();
    await runCli(["--text", "tôi có 15 con mèo."], cap.io, {});
    expect(cap.stdout()).toBe("Tôi có mười lăm con mèo .\n");
  });

  it("keeps log records off stdout when segmenting", async () => {
    vi.stubEnv("LOG_LEVEL", "info");
    const cap = captureIo();
    await runCli(["--text", "tôi có 15 con mèo.", "--segment"], cap.io, MISSING_PYTHON);

    expect(cap.stdout()).toBe("Tôi có mười lăm con mèo .\n");
    const records = cap
      .stderr()
      .trim()
      .split("\n")
      .map((line): unknown => JSON.parse(line));
    expect(records).toContainEqual(
      expect.objectContaining({ level: "info", msg: "word segmenter unavailable; segmentation is a no-op" }),
    );
  });

  it("does not probe the segmenter when it is disabled", async () => {
    const ready = vi.spyOn(UndertheseaSegmenter.prototype, "ready");
    const cap = captureIo();
    await runCli(["--text", "ở thành phố Huế", "--segment"], cap.io, { SEGMENTER_ENABLED: "false" });

    expect(ready).not.toHaveBeenCalled();
    expect(cap.stdout()).toBe("Ở thành phố Huế\n");
  });

  it("reads stdin and runs only the requested stage", async () => {
    const cap = captureIo("Đi tp. HCM  có 2 quận\n");
    await runCli(["--stage", "normalize", "--no-abbreviations"], cap.io, {});
    expect(cap.stdout()).toBe("Đi tp. HCM có 2 quận\n");

    const numbers = captureIo("Đi tp. HCM có 2 quận");
    await runCli(["--stage", "numbers"], numbers.io, {});
    expect(numbers.stdout()).toBe("Đi thành phố HCM có hai quận\n");
  });

  it("reports validation on stderr", async () => {
    const cap = captureIo();
    await runCli(["--text", "xin chào 你好", "--validate"], cap.io, {});
    expect(cap.stdout()).toBe("Xin chào 你好\n");
    expect(cap.stderr()).toBe("valid: false\n");
  });

  it("rejects an unknown stage and restores the log writer", async () => {
    const cap = captureIo();
    await expect(runCli(["--stage", "loud", "--text", "a"], cap.io, {})).rejects.toThrow(
      "--stage must be one of normalize, numbers, full",
    );

    const out = vi.spyOn(console, "log").mockImplementation(() => undefined);
    log.error("after the run");
    expect(out).toHaveBeenCalledTimes(1);
    expect(cap.stderr()).toBe("");
  });

  it("asks for input when there is none", async () => {
    const cap = captureIo();
    await expect(runCli([], cap.io, {})).rejects.toThrow("Provide --text or pipe text on stdin");
  });
});
