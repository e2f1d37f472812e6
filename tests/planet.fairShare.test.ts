import { describe, it } from "mocha";
import { expect } from "chai";

import { PlanetConfigurationError } from "../src/planet/errors.js";
import { DEFAULT_FAIR_SHARE_TUNING, FairShareLimiter } from "../src/planet/fairShare.js";
import { ManualClock } from "./lib/planetHarness.js";

describe("planet/fairShare limiter", () => {
  it("never refuses a lone active explorer whatever its score", () => {
    const clock = new ManualClock();
    const limiter = new FairShareLimiter({ now: clock.now });

    const decisions = Array.from({ length: 10 }, () => limiter.admit(7));

    expect(decisions.every((decision) => decision.granted)).to.equal(true);
    expect(decisions.map((decision) => decision.basis)).to.deep.equal(new Array(10).fill("sole-user"));
    expect(decisions[9]?.score).to.equal(10);
    expect(limiter.snapshot()).to.deep.equal([{ explorerId: 7, score: 10, lastRequestAt: 0 }]);
  });

  it("refuses an explorer once its score exceeds the average times the tolerance", () => {
    const clock = new ManualClock();
    const limiter = new FairShareLimiter({ now: clock.now });

    expect(limiter.admit(3).basis).to.equal("sole-user");
    const second = limiter.admit(2);
    expect(second).to.include({ granted: true, basis: "within-share", activeCount: 2, tolerance: 2.5 });

    const burst = Array.from({ length: 5 }, () => limiter.admit(1));
    expect(burst.map((decision) => decision.granted)).to.deep.equal([true, true, true, true, false]);

    const refused = burst[4];
    expect(refused?.basis).to.equal("over-share");
    expect(refused?.score).to.equal(5);
    expect(refused?.activeCount).to.equal(3);
    expect(refused?.tolerance).to.equal(2);
    expect(refused?.averageScore).to.be.closeTo(7 / 3, 1e-9);

    // The refused attempt is still billed.
    const again = limiter.admit(1);
    expect(again.granted).to.equal(false);
    expect(again.score).to.equal(6);

    // The lighter explorer keeps being served.
    const light = limiter.admit(2);
    expect(light).to.include({ granted: true, score: 2, averageScore: 3 });
  });

  it("cannot refuse anyone while only two explorers are tracked", () => {
    const clock = new ManualClock();
    const limiter = new FairShareLimiter({ now: clock.now });

    limiter.admit(2);
    const heavy = Array.from({ length: 20 }, () => limiter.admit(1));

    // With two active explorers the tolerance is 2.5, so score <= 1.25 * (a + b) always holds.
    expect(heavy.every((decision) => decision.granted)).to.equal(true);
    expect(heavy[19]).to.include({ basis: "within-share", score: 20, activeCount: 2 });
  });

  it("keeps the gap between a heavy and a light explorer bounded over many rounds", () => {
    const clock = new ManualClock();
    const limiter = new FairShareLimiter({ now: clock.now });
    const heavyGrants: boolean[][] = [];
    const lightGrants: boolean[] = [];
    const gaps: number[] = [];

    for (let round = 0; round < 12; round += 1) {
      const start = round * 10_000;
      clock.set(start);
      limiter.admit(3);
      clock.set(start + 1_000);
      lightGrants.push(limiter.admit(2).granted);
      clock.set(start + 2_000);
      heavyGrants.push(Array.from({ length: 5 }, () => limiter.admit(1).granted));

      const scores = new Map(limiter.snapshot().map((record) => [record.explorerId, record.score]));
      gaps.push((scores.get(1) ?? 0) - (scores.get(2) ?? 0));
    }

    expect(lightGrants).to.deep.equal(new Array(12).fill(true));
    expect(heavyGrants).to.deep.equal(new Array(12).fill([true, false, false, false, false]));
    expect(gaps).to.deep.equal(new Array(12).fill(5));
  });

  it("decays idle explorers by their time since the last request", () => {
    const clock = new ManualClock();
    const limiter = new FairShareLimiter({ now: clock.now });

    limiter.admit(1);
    clock.set(1_000);
    limiter.admit(2);
    expect(limiter.snapshot()).to.deep.equal([
      { explorerId: 1, score: 0.5, lastRequestAt: 0 },
      { explorerId: 2, score: 1, lastRequestAt: 1_000 },
    ]);

    clock.set(2_000);
    limiter.admit(2);
    expect(limiter.snapshot()).to.deep.equal([
      { explorerId: 1, score: 0, lastRequestAt: 0 },
      { explorerId: 2, score: 2, lastRequestAt: 2_000 },
    ]);
  });

  it("only lowers an idle score as time passes, down to zero", () => {
    const clock = new ManualClock();
    const limiter = new FairShareLimiter({ now: clock.now });

    for (let index = 0; index < 4; index += 1) {
      limiter.admit(1);
    }

    const observed: number[] = [];
    for (let step = 1; step <= 6; step += 1) {
      clock.set(step * 500);
      limiter.admit(2);
      const idle = limiter.snapshot().find((record) => record.explorerId === 1);
      observed.push(idle?.score ?? Number.NaN);
    }

    expect(observed).to.deep.equal([3.75, 3.25, 2.5, 1.5, 0.25, 0]);
  });

  it("counts explorers as active strictly inside the contention window", () => {
    const inside = new ManualClock();
    const insideLimiter = new FairShareLimiter({ now: inside.now });
    insideLimiter.admit(1);
    inside.set(2_999);
    expect(insideLimiter.admit(2).activeCount).to.equal(2);

    const edge = new ManualClock();
    const edgeLimiter = new FairShareLimiter({ now: edge.now });
    edgeLimiter.admit(1);
    edge.set(3_000);
    expect(edgeLimiter.admit(2)).to.include({ activeCount: 1, basis: "sole-user", trackedCount: 2 });
  });

  it("treats an unmeasurable interval as one contention window", () => {
    const clock = new ManualClock(5_000);
    const limiter = new FairShareLimiter({ now: clock.now });

    for (let index = 0; index < 4; index += 1) {
      limiter.admit(1);
    }

    // The clock jumps backwards: explorer 1 is decayed by 3s and no longer active.
    clock.set(1_000);
    const decision = limiter.admit(2);

    expect(decision).to.include({ activeCount: 1, basis: "sole-user", granted: true });
    expect(limiter.snapshot()[0]).to.deep.equal({ explorerId: 1, score: 2.5, lastRequestAt: 5_000 });
  });

  it("exposes the default tuning and rejects invalid overrides", () => {
    expect(new FairShareLimiter().getTuning()).to.deep.equal(DEFAULT_FAIR_SHARE_TUNING);

    let caught: unknown;
    try {
      new FairShareLimiter({ requestCost: 0 });
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(PlanetConfigurationError);
    if (caught instanceof PlanetConfigurationError) {
      expect(caught.code).to.equal("E-PLANET-CONFIG");
      expect(caught.issues).to.have.length(1);
      expect(caught.issues[0]).to.match(/^requestCost: /);
    }
  });
});
