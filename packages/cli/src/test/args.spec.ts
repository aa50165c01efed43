import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ConfigurationError } from "@loopwalk/core";
import { parseCliArgs } from "../args.js";

describe("Command-line arguments", () => {
  it("applies defaults to everything but the input", () => {
    assert.deepStrictEqual(parseCliArgs(["song.wav"]), {
      kind: "run",
      options: {
        inputPath: "song.wav",
        outputPath: "infinite.wav",
        remix: {
          targetDurationSeconds: 300,
          threshold: undefined,
          branchProbability: undefined,
          seed: undefined,
          degenerateGraph: "warn"
        },
        quiet: false
      }
    });
  });

  it("reads every flag and converts minutes to seconds", () => {
    const command = parseCliArgs([
      "in.wav",
      "-o",
      "out.wav",
      "-d",
      "0.5",
      "-t",
      "40",
      "-p",
      "0.25",
      "-s",
      "99",
      "--strict",
      "-q"
    ]);

    assert.deepStrictEqual(command, {
      kind: "run",
      options: {
        inputPath: "in.wav",
        outputPath: "out.wav",
        remix: {
          targetDurationSeconds: 30,
          threshold: 40,
          branchProbability: 0.25,
          seed: 99,
          degenerateGraph: "reject"
        },
        quiet: true
      }
    });
  });

  it("accepts long flag names", () => {
    const command = parseCliArgs(["in.wav", "--output", "x.wav", "--duration", "2", "--prob", "1"]);
    assert.strictEqual(command.kind, "run");
    if (command.kind === "run") {
      assert.strictEqual(command.options.outputPath, "x.wav");
      assert.strictEqual(command.options.remix.targetDurationSeconds, 120);
      assert.strictEqual(command.options.remix.branchProbability, 1);
    }
  });

  it("returns help without requiring an input", () => {
    assert.deepStrictEqual(parseCliArgs(["--help"]), { kind: "help" });
    assert.deepStrictEqual(parseCliArgs(["song.wav", "-h"]), { kind: "help" });
  });

  it("requires exactly one input file", () => {
    assert.throws(() => parseCliArgs([]), { name: "ConfigurationError", message: "Missing input file" });
    assert.throws(() => parseCliArgs(["a.wav", "b.wav"]), { message: "Expected one input file, got 2" });
  });

  it("rejects values that are not numbers", () => {
    assert.throws(() => parseCliArgs(["in.wav", "-p", "often"]), {
      name: "ConfigurationError",
      message: '--prob expects a number, got "often"'
    });
    assert.throws(() => parseCliArgs(["in.wav", "--duration", " "]), {
      message: '--duration expects a number, got " "'
    });
  });

  it("rejects unknown flags", () => {
    assert.throws(() => parseCliArgs(["in.wav", "--loud"]), ConfigurationError);
  });
});
