import { expect } from "chai";
import { EventLog } from "../offchain/src/shared/events";

describe("EventLog", () => {
  it("stamps events with the injected clock", () => {
    const log = new EventLog(() => 0);

    const event = log.publish("config_updated", { field: "treasury", value: "vault.test" });

    expect(event).to.deep.equal({
      name: "config_updated",
      ts: "1970-01-01T00:00:00.000Z",
      data: { field: "treasury", value: "vault.test" },
    });
  });

  it("filters by kind", () => {
    const log = new EventLog();
    log.publish("config_updated", { field: "owner", value: "alice" });
    log.publish("bid_cancelled", { bidder: "bob", registry: "assets.test", assetId: "tok-1" });

    expect(log.ofKind("bid_cancelled").map((e) => e.data.bidder)).to.deep.equal(["bob"]);
    expect(log.all()).to.have.length(2);
  });

  it("keeps notifying when a listener throws", () => {
    const log = new EventLog();
    const seen: string[] = [];
    log.subscribe(() => {
      throw new Error("listener down");
    });
    const unsubscribe = log.subscribe((event) => seen.push(event.name));

    log.publish("config_updated", { field: "owner", value: "alice" });
    unsubscribe();
    log.publish("config_updated", { field: "owner", value: "carol" });

    expect(seen).to.deep.equal(["config_updated"]);
  });
});
