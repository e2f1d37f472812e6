import { describe, it } from "mocha";
import { expect } from "chai";

import { createConfiguredLogger, loadPlanetConfig } from "../../src/config/planetConfig.js";
import { StructuredLogger } from "../../src/logger.js";
import { EXPLORER_REQUEST_LIMITS } from "../../src/planet/ai.js";

describe("config/planetConfig", () => {
  it("falls back to the documented defaults", () => {
    expect(loadPlanetConfig({})).to.deep.equal({
      requestLimit: "unrestricted",
      log: { file: null, level: "info" },
      fairShare: { contentionWindowMs: 3000, decayPerSecond: 0.5, allowedRequestBurst: 3, requestCost: 1 },
    });
  });

  it("reads every override", () => {
    const config = loadPlanetConfig({
      PLANET_REQUEST_LIMIT: "Fair-Share",
      PLANET_LOG_FILE: "./logs/planet.log",
      PLANET_LOG_LEVEL: "DEBUG",
      PLANET_FAIR_SHARE_WINDOW_MS: "1500",
      PLANET_FAIR_SHARE_DECAY_PER_SECOND: "0",
      PLANET_FAIR_SHARE_BURST: "1.5",
      PLANET_FAIR_SHARE_REQUEST_COST: "2",
    });

    expect(config).to.deep.equal({
      requestLimit: "fair-share",
      log: { file: "./logs/planet.log", level: "debug" },
      fairShare: { contentionWindowMs: 1500, decayPerSecond: 0, allowedRequestBurst: 1.5, requestCost: 2 },
    });
  });

  for (const limit of EXPLORER_REQUEST_LIMITS) {
    it(`accepts the ${limit} request limit`, () => {
      expect(loadPlanetConfig({ PLANET_REQUEST_LIMIT: limit }).requestLimit).to.equal(limit);
    });
  }

  it("keeps defaults for unparseable or out-of-range values", () => {
    const config = loadPlanetConfig({
      PLANET_REQUEST_LIMIT: "strict",
      PLANET_LOG_LEVEL: "verbose",
      PLANET_FAIR_SHARE_WINDOW_MS: "0",
      PLANET_FAIR_SHARE_DECAY_PER_SECOND: "-1",
      PLANET_FAIR_SHARE_BURST: "lots",
      PLANET_FAIR_SHARE_REQUEST_COST: "0",
    });

    expect(config.requestLimit).to.equal("unrestricted");
    expect(config.log.level).to.equal("info");
    expect(config.fairShare).to.deep.equal({
      contentionWindowMs: 3000,
      decayPerSecond: 0.5,
      allowedRequestBurst: 3,
      requestCost: 1,
    });
  });

  it("builds a logger from the configuration", () => {
    const logger = createConfiguredLogger(loadPlanetConfig({}));
    expect(logger).to.be.instanceOf(StructuredLogger);
  });
});
