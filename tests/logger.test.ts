import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { StructuredLogger, type LogEntry } from "../src/logger.js";

const FIXED_NOW = new Date("2024-05-01T12:00:00.000Z");

describe("StructuredLogger", () => {
  it("writes one JSON object per line", () => {
    const sink = sinon.spy();
    const logger = new StructuredLogger({ sink, now: () => FIXED_NOW });

    logger.info("closure_computed", { nodes: 3 });

    sinon.assert.calledOnceWithExactly(
      sink,
      '{"timestamp":"2024-05-01T12:00:00.000Z","level":"info","message":"closure_computed","payload":{"nodes":3}}\n',
    );
  });

  it("omits the payload key when no payload is given", () => {
    const sink = sinon.spy();
    const logger = new StructuredLogger({ sink, now: () => FIXED_NOW });

    logger.error("boom");

    sinon.assert.calledOnceWithExactly(
      sink,
      '{"timestamp":"2024-05-01T12:00:00.000Z","level":"error","message":"boom"}\n',
    );
  });

  it("drops entries below the minimum level", () => {
    const sink = sinon.spy();
    const logger = new StructuredLogger({ sink, minLevel: "warn" });

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(sink.callCount).to.equal(2);
    expect(logger.isLevelEnabled("info")).to.equal(false);
    expect(logger.isLevelEnabled("error")).to.equal(true);
  });

  it("emits nothing when silent", () => {
    const sink = sinon.spy();
    const onEntry = sinon.spy();
    const logger = new StructuredLogger({ sink, onEntry, minLevel: "silent" });

    logger.error("dropped");

    expect(sink.called).to.equal(false);
    expect(onEntry.called).to.equal(false);
  });

  it("hands listeners a copy of every emitted entry", () => {
    const received: LogEntry[] = [];
    const payload = { nodes: 2 };
    const logger = new StructuredLogger({
      sink: () => undefined,
      now: () => FIXED_NOW,
      onEntry: (entry) => received.push(entry),
    });

    logger.debug("scc_computed", payload);
    payload.nodes = 5;

    expect(received).to.deep.equal([
      { timestamp: "2024-05-01T12:00:00.000Z", level: "debug", message: "scc_computed", payload: { nodes: 2 } },
    ]);
  });
});
