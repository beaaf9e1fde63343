import { expect } from "chai";
import {
  by,
  createTestMarket,
  list,
  MARKET,
  OWNER,
  REGISTRY,
  START,
  TestMarket,
  TREASURY,
  UNIT,
} from "./helpers/market";

const BALANCE = 1_000_000n;

function buy(t: TestMarket, buyer: string, price: bigint, assetId = "tok-1") {
  return t.market.buy(by(buyer, price), { registry: REGISTRY, assetId });
}

describe("settlement", () => {
  let t: TestMarket;

  beforeEach(() => {
    t = createTestMarket();
  });

  describe("valid payout", () => {
    it("takes the fee from the seller's entry and pays royalties in full", async () => {
      list(t, "alice", "tok-1", 1000n);
      t.registry.willPay({ alice: "950", "royalty.test": "50" });

      const ticket = buy(t, "bob", 1000n);
      const record = await t.market.whenSettled(ticket.settlementId);

      expect(record?.status).to.equal("paid");
      expect(record?.royalties).to.equal(true);
      expect(record?.transfers).to.deep.equal([
        { to: "alice", amount: 930n, reason: "seller" },
        { to: TREASURY, amount: 20n, reason: "fee" },
        { to: "royalty.test", amount: 50n, reason: "royalty" },
      ]);
      expect(t.ledger.balanceOf("alice")).to.equal(BALANCE - UNIT + 930n);
      expect(t.ledger.balanceOf(TREASURY)).to.equal(20n);
      expect(t.ledger.balanceOf("royalty.test")).to.equal(50n);
      expect(t.ledger.balanceOf("bob")).to.equal(BALANCE - 1000n);
    });

    it("accepts the payout wrapped in an envelope", async () => {
      list(t, "alice", "tok-1", 1000n);
      t.registry.willReturn(JSON.stringify({ payout: { alice: "950", "royalty.test": "50" } }));

      buy(t, "bob", 1000n);
      await t.market.drain();

      expect(t.ledger.balanceOf("alice")).to.equal(BALANCE - UNIT + 930n);
      expect(t.ledger.balanceOf("royalty.test")).to.equal(50n);
    });

    it("keeps rounding dust within the tolerance in the market account", async () => {
      list(t, "alice", "tok-1", 1000n);
      t.registry.willPay({ alice: "900", "royalty.test": "50" });

      buy(t, "bob", 1000n);
      await t.market.drain();

      expect(t.ledger.balanceOf("alice")).to.equal(BALANCE - UNIT + 880n);
      expect(t.ledger.balanceOf(TREASURY)).to.equal(20n);
      expect(t.ledger.balanceOf(MARKET)).to.equal(UNIT + 50n);
    });

    it("charges no fee when the seller is not a recipient", async () => {
      list(t, "alice", "tok-1", 1000n);
      t.registry.willPay({ "heir.test": "600", "royalty.test": "400" });

      buy(t, "bob", 1000n);
      await t.market.drain();

      expect(t.ledger.balanceOf("heir.test")).to.equal(600n);
      expect(t.ledger.balanceOf("royalty.test")).to.equal(400n);
      expect(t.ledger.balanceOf(TREASURY)).to.equal(0n);
    });
  });

  describe("no royalties", () => {
    const cases: Array<[string, string]> = [
      ["an empty response", ""],
      ["a sum short by more than the tolerance", JSON.stringify({ alice: "800" })],
      ["a sum above the price", JSON.stringify({ alice: "1001" })],
      ["a seller entry smaller than the fee", JSON.stringify({ alice: "10", "royalty.test": "990" })],
    ];

    for (const [label, raw] of cases) {
      it(`pays the seller price minus fee for ${label}`, async () => {
        list(t, "alice", "tok-1", 1000n);
        t.registry.willReturn(raw);

        const ticket = buy(t, "bob", 1000n);
        await t.market.drain();

        expect(t.market.settlement(ticket.settlementId)?.royalties).to.equal(false);
        expect(t.ledger.balanceOf("alice")).to.equal(BALANCE - UNIT + 980n);
        expect(t.ledger.balanceOf(TREASURY)).to.equal(20n);
        expect(t.ledger.balanceOf("royalty.test")).to.equal(0n);
      });
    }

    it("splits fee and net to exactly the price for any fee rate", async () => {
      const rates = [0, 1, 200, 333, 9999];
      const prices = [1n, 7n, 999n, 123_457n];

      for (const feeBps of rates) {
        for (const price of prices) {
          const local = createTestMarket({ transactionFeeBps: feeBps });
          list(local, "alice", "tok-1", price);
          local.market.buy(by("bob", price), { registry: REGISTRY, assetId: "tok-1" });
          await local.market.drain();

          const fee = (price * BigInt(feeBps)) / 10_000n;
          const net = local.ledger.balanceOf("alice") - (BALANCE - UNIT);
          expect(net).to.equal(price - fee);
          expect(local.ledger.balanceOf(TREASURY)).to.equal(fee);
        }
      }
    });

    it("skips the treasury transfer when the fee is zero", async () => {
      t = createTestMarket({ transactionFeeBps: 0 });
      list(t, "alice", "tok-1", 1000n);

      const ticket = buy(t, "bob", 1000n);
      const record = await t.market.whenSettled(ticket.settlementId);

      expect(record?.transfers).to.deep.equal([{ to: "alice", amount: 1000n, reason: "seller" }]);
    });
  });

  describe("registry failure", () => {
    it("refunds the buyer, charges no fee and does not restore the listing", async () => {
      list(t, "alice", "tok-1", 500n);
      t.registry.willFail("stale approval");

      const ticket = buy(t, "bob", 500n);
      const record = await t.market.whenSettled(ticket.settlementId);

      expect(record?.status).to.equal("refunded");
      expect(record?.failureReason).to.equal("stale approval");
      expect(t.ledger.balanceOf("bob")).to.equal(BALANCE);
      expect(t.ledger.balanceOf(TREASURY)).to.equal(0n);
      expect(t.ledger.balanceOf("alice")).to.equal(BALANCE - UNIT);
      expect(t.market.getListing(REGISTRY, "tok-1")).to.equal(undefined);
      expect(t.market.events.ofKind("purchase_failed")[0].data.reason).to.equal("stale approval");
    });

    it("ignores whatever payload a failed transfer would have carried", async () => {
      list(t, "alice", "tok-1", 500n);
      const held = t.registry.willHold();

      const ticket = buy(t, "bob", 500n);
      held.reject("timeout");
      await t.market.drain();

      expect(t.market.settlement(ticket.settlementId)?.transfers).to.deep.equal([
        { to: "bob", amount: 500n, reason: "refund" },
      ]);
    });
  });

  describe("failed resolution", () => {
    it("rolls the resolution back and leaves the settlement scheduled", async () => {
      list(t, "alice", "tok-1", 500n);
      const held = t.registry.willHold();
      const ticket = buy(t, "bob", 500n);

      // escrow leaves the market account behind its back
      t.ledger.transfer(MARKET, "dave", UNIT + 500n);
      held.resolve("");
      await t.market.drain();

      expect(t.market.settlement(ticket.settlementId)).to.deep.include({
        status: "scheduled",
        transfers: [],
        failureReason: "market holds 0, cannot pay out 500",
      });
      expect(t.ledger.balanceOf("alice")).to.equal(BALANCE - UNIT);
      expect(t.ledger.balanceOf(TREASURY)).to.equal(0n);
      expect(t.market.events.ofKind("purchase_resolved")).to.deep.equal([]);
    });
  });

  describe("across the asynchronous boundary", () => {
    it("resolves from the snapshot even after the key is listed again", async () => {
      list(t, "alice", "tok-1", 1000n);
      const held = t.registry.willHold();
      const ticket = buy(t, "bob", 1000n);

      expect(t.market.settlement(ticket.settlementId)?.status).to.equal("scheduled");
      expect(t.market.getListing(REGISTRY, "tok-1")).to.equal(undefined);

      list(t, "alice", "tok-1", 5000n, {}, 2);
      held.resolve("");
      await t.market.drain();

      const record = t.market.settlement(ticket.settlementId);
      expect(record?.status).to.equal("paid");
      expect(record?.snapshot.price).to.equal(1000n);
      expect(record?.snapshot.listing?.approvalId).to.equal(1);
      expect(t.market.getListing(REGISTRY, "tok-1")?.price).to.equal(5000n);
      expect(t.ledger.balanceOf("alice")).to.equal(BALANCE - UNIT + 980n);
    });

    it("reads the fee and treasury current at resolution", async () => {
      list(t, "alice", "tok-1", 1000n);
      const held = t.registry.willHold();
      buy(t, "bob", 1000n);

      t.market.setTransactionFee(by(OWNER, 1n), 500);
      t.market.setTreasury(by(OWNER, 1n), "vault.test");
      held.resolve("");
      await t.market.drain();

      expect(t.ledger.balanceOf("vault.test")).to.equal(50n);
      expect(t.ledger.balanceOf("alice")).to.equal(BALANCE - UNIT + 950n);
    });

    it("stamps the snapshot with the scheduling time", async () => {
      list(t, "alice", "tok-1", 1000n);
      t.clock.now = START + 42;

      const ticket = buy(t, "bob", 1000n);
      t.clock.now = START + 99;
      const record = await t.market.whenSettled(ticket.settlementId);

      expect(record?.snapshot.scheduledAt).to.equal(START + 42);
      expect(record?.resolvedAt).to.equal(START + 99);
    });
  });

  describe("buy", () => {
    beforeEach(() => {
      list(t, "alice", "tok-1", 1000n);
    });

    it("refunds deposit above the price", async () => {
      t.market.buy(by("bob", 1500n), { registry: REGISTRY, assetId: "tok-1" });
      await t.market.drain();

      expect(t.ledger.balanceOf("bob")).to.equal(BALANCE - 1000n);
    });

    it("checks the optional currency and price against the listing", () => {
      expect(() => t.market.buy(by("bob", 1000n), { registry: REGISTRY, assetId: "tok-1", price: 999n })).to.throw(
        "price differs"
      );
      expect(() =>
        t.market.buy(by("bob", 1000n), { registry: REGISTRY, assetId: "tok-1", currency: "usd" })
      ).to.throw("currency differs");
      expect(t.market.getListing(REGISTRY, "tok-1")).to.not.equal(undefined);
    });

    it("rejects the seller and short deposits without moving funds", () => {
      expect(() => buy(t, "alice", 1000n)).to.throw("Cannot buy your own sale");
      expect(() => buy(t, "bob", 999n)).to.throw("less than price");
      expect(t.ledger.balanceOf("bob")).to.equal(BALANCE);
      expect(t.market.events.ofKind("purchase_resolved")).to.have.length(0);
    });

    it("publishes nothing for a rejected call", () => {
      const before = t.market.events.all().length;

      expect(() => buy(t, "bob", 10n)).to.throw();

      expect(t.market.events.all()).to.have.length(before);
      expect(t.registry.requests).to.have.length(0);
    });
  });
});
