import { describe, expect, it } from "vitest";
import { testLogger } from "../test/fakes";
import { Logger, MemorySink } from "./logger";

const CLEAR = "\r\x1b[K";

describe("Logger", () => {
  it("writes every entry to the file sink and visible ones to the user sink", () => {
    const { logger, user, file } = testLogger();

    logger.info("test", "hello");

    expect(file.text).toBe("[2024-05-01 10:20:30] [INFO] [test] hello\n");
    expect(user.text).toBe("[10:20:30] hello\n");
  });

  it("keeps noise out of the user sink but not the file sink", () => {
    const { logger, user, file } = testLogger();

    logger.info("compose", "Digest: sha256:0123abcd");
    logger.info("compose", "a1b2c3d4e5f6: Pull complete");
    logger.info("compose", "");

    expect(user.text).toBe("");
    expect(file.lines).toEqual([
      "[2024-05-01 10:20:30] [INFO] [compose] Digest: sha256:0123abcd",
      "[2024-05-01 10:20:30] [INFO] [compose] a1b2c3d4e5f6: Pull complete",
      "[2024-05-01 10:20:30] [INFO] [compose] ",
    ]);
    expect(logger.getEntries()).toHaveLength(3);
    expect(logger.getUserEntries()).toHaveLength(0);
  });

  it("rewrites technical messages for the user only", () => {
    const { logger, user, file } = testLogger();

    logger.info("compose", "Container devstack-code-server  Started");
    logger.info("compose", "Pulling from library/alpine");

    expect(user.lines).toEqual([
      "[10:20:30] Started: devstack-code-server",
      "[10:20:30] Downloading image: library/alpine",
    ]);
    expect(file.lines[0]).toBe(
      "[2024-05-01 10:20:30] [INFO] [compose] Container devstack-code-server  Started",
    );
  });

  it("marks warnings and errors", () => {
    const { logger, user } = testLogger();

    logger.warning("x", "careful");
    logger.error("x", "broken");

    expect(user.lines).toEqual(["[10:20:30] ⚠ careful", "[10:20:30] ✗ broken"]);
  });

  it("hides debug below the minimum level", () => {
    const { logger, user } = testLogger();

    logger.debug("x", "details");
    logger.setMinLevel("warning");
    logger.info("x", "progress note");

    expect(user.text).toBe("");
    expect(logger.getEntries("info")).toHaveLength(1);
  });

  it("shows everything untransformed in verbose mode", () => {
    const { logger, user } = testLogger();
    logger.setVerbose(true);

    logger.debug("x", "details");
    logger.info("compose", "Digest: sha256:0123abcd");
    logger.info("compose", "Container web  Started");

    expect(user.lines).toEqual([
      "[10:20:30] details",
      "[10:20:30] Digest: sha256:0123abcd",
      "[10:20:30] Container web  Started",
    ]);
  });

  it("redraws one progress line and terminates it", () => {
    const { logger, user } = testLogger();

    logger.progress("pull", "step 1");
    logger.progress("pull", "step 2");
    expect(logger.activeProgress).toBe("step 2");
    logger.progressDone();
    logger.progressDone();

    expect(user.text).toBe(
      `${CLEAR}[10:20:30] step 1${CLEAR}[10:20:30] step 2\n`,
    );
    expect(logger.activeProgress).toBe("");
  });

  it("clears the progress line before a normal line", () => {
    const { logger, user } = testLogger();

    logger.progress("pull", "step 1");
    logger.info("pull", "done");
    logger.progressDone();

    expect(user.text).toBe(`${CLEAR}[10:20:30] step 1${CLEAR}[10:20:30] done\n`);
  });

  it("counts sink failures instead of throwing", () => {
    const broken = {
      write(): boolean {
        throw new Error("disk full");
      },
    };
    const logger = new Logger({ fileSink: broken, userSink: broken });

    expect(() => logger.error("x", "still fine")).not.toThrow();
    expect(logger.sinkFailures).toBe(2);
  });

  it("counts asynchronous sink errors", () => {
    const captured: { listener?: (err: Error) => void } = {};
    const sink = {
      write: () => true,
      on(_event: "error", listener: (err: Error) => void) {
        captured.listener = listener;
      },
    };
    const logger = new Logger({ fileSink: sink });

    captured.listener?.(new Error("EACCES"));

    expect(logger.sinkFailures).toBe(1);
  });

  it("keeps only the most recent entries", () => {
    const logger = new Logger({ userSink: new MemorySink(), maxEntries: 2 });

    logger.info("x", "one");
    logger.info("x", "two");
    logger.info("x", "three");

    expect(logger.getEntries().map((entry) => entry.message)).toEqual(["two", "three"]);
  });
});
