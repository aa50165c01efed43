import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { generateTrack, targetSampleCount } from "../phase/track-generation.js";
import { buildGraph } from "../phase/graph-building.js";
import { createSeededRandom } from "../random.js";
import { ConfigurationError, EmptyInputError, InputError } from "../errors.js";
import { makeBeat, makeBeats, makeRampBuffer, makeRandomBeats, scriptedRandom } from "./test-utils.js";

const SAMPLE_RATE = 44100;
const BEAT_FRAMES = 22050; // 0.5s at 44.1kHz

describe("Track Generation", () => {
  it("replays beats strictly in order when the branch probability is 0", () => {
    const beats = makeBeats(4);
    buildGraph(beats, { threshold: 1000 });
    const buffer = makeRampBuffer(4 * BEAT_FRAMES, SAMPLE_RATE);

    const { output, diagnostics } = generateTrack(buffer, beats, {
      targetDurationSeconds: 5,
      branchProbability: 0,
      random: createSeededRandom(1)
    });

    assert.deepStrictEqual(diagnostics.path, [0, 1, 2, 3, 0, 1, 2, 3, 0, 1]);
    assert.strictEqual(diagnostics.jumps, 0);
    assert.strictEqual(diagnostics.wraparounds, 2);
    assert.strictEqual(output.channels[0].length, 220500);
    for (const frame of [0, 22049, 22050, 88199, 88200, 220499]) {
      assert.strictEqual(output.channels[0][frame], frame % 88200, `frame ${frame}`);
    }
  });

  it("cuts the last beat short to hit the target exactly", () => {
    const beats = makeBeats(4);
    const buffer = makeRampBuffer(4 * BEAT_FRAMES, SAMPLE_RATE);

    const { output, diagnostics } = generateTrack(buffer, beats, {
      targetDurationSeconds: 1.2,
      branchProbability: 0,
      random: createSeededRandom(1)
    });

    assert.deepStrictEqual(diagnostics.path, [0, 1, 2]);
    assert.strictEqual(diagnostics.emittedSamples, 66150);
    assert.strictEqual(diagnostics.targetSamples, 52920);
    assert.strictEqual(output.channels[0].length, 52920);
    assert.strictEqual(output.channels[0][52919], 52919);
  });

  it("falls back to sequential advance with wraparound when no edges exist", () => {
    const beats = makeBeats(2);
    buildGraph(beats, { threshold: 0 });
    const buffer = makeRampBuffer(2 * BEAT_FRAMES, SAMPLE_RATE);

    const { diagnostics } = generateTrack(buffer, beats, {
      targetDurationSeconds: 2,
      branchProbability: 1,
      random: createSeededRandom(5)
    });

    assert.deepStrictEqual(diagnostics.path, [0, 1, 0, 1]);
    assert.strictEqual(diagnostics.jumps, 0);
    assert.strictEqual(diagnostics.wraparounds, 1);
  });

  it("jumps to a neighbor when the draw is below the branch probability", () => {
    const beats = makeBeats(8);
    buildGraph(beats, { threshold: 50 }); // beat i <-> beat (i + 4) % 8
    const buffer = makeRampBuffer(8 * BEAT_FRAMES, SAMPLE_RATE);

    const { output, diagnostics } = generateTrack(buffer, beats, {
      targetDurationSeconds: 2,
      branchProbability: 1,
      random: scriptedRandom([0])
    });

    assert.deepStrictEqual(diagnostics.path, [0, 4, 0, 4]);
    assert.strictEqual(diagnostics.jumps, 4);
    assert.strictEqual(output.channels[0][BEAT_FRAMES], 4 * BEAT_FRAMES);
  });

  it("advances sequentially when the draw reaches the branch probability", () => {
    const beats = makeBeats(8);
    buildGraph(beats, { threshold: 50 });
    const buffer = makeRampBuffer(8 * BEAT_FRAMES, SAMPLE_RATE);

    const { diagnostics } = generateTrack(buffer, beats, {
      targetDurationSeconds: 2,
      branchProbability: 0.5,
      random: scriptedRandom([0.5])
    });

    assert.deepStrictEqual(diagnostics.path, [0, 1, 2, 3]);
  });

  it("picks a neighbor by list position, ignoring its distance", () => {
    const beats = makeBeats(12);
    buildGraph(beats, { threshold: 50 }); // beat 0 -> [4, 8]
    assert.deepStrictEqual(beats[0].neighbors.map((neighbor) => neighbor.dest), [4, 8]);
    const buffer = makeRampBuffer(12 * BEAT_FRAMES, SAMPLE_RATE);

    // branch (0 < 0.5), pick floor(0.6 * 2) = 1, then no branch at beat 8 (0.99 >= 0.5)
    const { diagnostics } = generateTrack(buffer, beats, {
      targetDurationSeconds: 1,
      branchProbability: 0.5,
      random: scriptedRandom([0, 0.6, 0.99])
    });

    assert.deepStrictEqual(diagnostics.path, [0, 8]);
    assert.strictEqual(diagnostics.jumps, 1);
  });

  it("produces identical output for the same seed", () => {
    const beats = makeRandomBeats(16, 31);
    buildGraph(beats, { threshold: 80 });
    const buffer = makeRampBuffer(16 * BEAT_FRAMES, SAMPLE_RATE);
    const run = () =>
      generateTrack(buffer, beats, {
        targetDurationSeconds: 30,
        branchProbability: 0.5,
        random: createSeededRandom(42)
      });

    const first = run();
    const second = run();
    assert.deepStrictEqual(second.diagnostics, first.diagnostics);
    assert.deepStrictEqual(second.output, first.output);
  });

  it("outputs exactly round(duration * sampleRate) frames", () => {
    const beats = makeRandomBeats(6, 3);
    buildGraph(beats, { threshold: 80 });
    for (const sampleRate of [8000, 22050, 44100]) {
      const buffer = makeRampBuffer(Math.ceil(6 * 0.5 * sampleRate), sampleRate);
      for (const minutes of [0.001, 0.0123, 0.05]) {
        const { output } = generateTrack(buffer, beats, {
          targetDurationSeconds: minutes * 60,
          branchProbability: 0.5,
          random: createSeededRandom(11)
        });
        assert.strictEqual(output.channels[0].length, Math.round(minutes * 60 * sampleRate));
      }
    }
    assert.strictEqual(targetSampleCount(0.1, 44100), 4410);
  });

  it("copies every channel of the visited spans", () => {
    const beats = makeBeats(2);
    const buffer = makeRampBuffer(2 * BEAT_FRAMES, SAMPLE_RATE, 2);

    const { output } = generateTrack(buffer, beats, {
      targetDurationSeconds: 1.5,
      branchProbability: 0,
      random: createSeededRandom(1)
    });

    assert.strictEqual(output.channels.length, 2);
    assert.strictEqual(output.channels[1][100], -100);
    assert.strictEqual(output.channels[1][BEAT_FRAMES * 2 + 5], -5);
  });

  it("terminates on beats shorter than one frame", () => {
    const beats = [makeBeat(0, { start: 0, duration: 0.05 }), makeBeat(1, { start: 0.05, duration: 0.05 })];
    const buffer = makeRampBuffer(10, 10);

    const { output, diagnostics } = generateTrack(buffer, beats, {
      targetDurationSeconds: 1,
      branchProbability: 0,
      random: createSeededRandom(1)
    });

    assert.strictEqual(output.channels[0].length, 10);
    assert.strictEqual(diagnostics.path.length, 10);
  });

  it("maps beat times derived from frame positions back to those exact frames", () => {
    // At 44.1 kHz, flooring (frame / rate) * rate lands one frame early for each of these boundaries
    const boundaries = [0, 15, 30, 46, 60];
    const beats = boundaries.slice(0, -1).map((frame, i) =>
      makeBeat(i, {
        start: frame / SAMPLE_RATE,
        duration: (boundaries[i + 1] - frame) / SAMPLE_RATE
      })
    );
    const buffer = makeRampBuffer(60, SAMPLE_RATE);

    const { output, diagnostics } = generateTrack(buffer, beats, {
      targetDurationSeconds: 60 / SAMPLE_RATE,
      branchProbability: 0,
      random: createSeededRandom(1)
    });

    assert.deepStrictEqual(diagnostics.path, [0, 1, 2, 3]);
    assert.deepStrictEqual(Array.from(output.channels[0]), Array.from({ length: 60 }, (_, i) => i));
  });

  it("rejects an empty beat list before generating", () => {
    const buffer = makeRampBuffer(100, SAMPLE_RATE);
    assert.throws(
      () => generateTrack(buffer, [], { targetDurationSeconds: 1, branchProbability: 0.5, random: Math.random }),
      EmptyInputError
    );
  });

  it("rejects invalid probability and duration", () => {
    const buffer = makeRampBuffer(BEAT_FRAMES, SAMPLE_RATE);
    const beats = makeBeats(1);
    const random = createSeededRandom(1);
    assert.throws(
      () => generateTrack(buffer, beats, { targetDurationSeconds: 1, branchProbability: 1.5, random }),
      ConfigurationError
    );
    assert.throws(
      () => generateTrack(buffer, beats, { targetDurationSeconds: 0, branchProbability: 0.5, random }),
      ConfigurationError
    );
  });

  it("rejects beats that start past the end of the buffer", () => {
    const buffer = makeRampBuffer(BEAT_FRAMES, SAMPLE_RATE);
    assert.throws(
      () =>
        generateTrack(buffer, makeBeats(2), {
          targetDurationSeconds: 1,
          branchProbability: 0,
          random: createSeededRandom(1)
        }),
      InputError
    );
  });
});
