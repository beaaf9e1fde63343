import { expect } from "chai";
import { MARKET_LIMITS } from "../offchain/src/market/types";
import {
  by,
  createTestMarket,
  expectMarketError,
  list,
  MARKET,
  OWNER,
  REGISTRY,
  saleMessage,
  START,
  TestMarket,
  UNIT,
} from "./helpers/market";

describe("listings", () => {
  let t: TestMarket;

  beforeEach(() => {
    t = createTestMarket();
  });

  describe("creation through registry approval", () => {
    it("records a fixed-price listing and a reservation", () => {
      const result = list(t, "alice", "tok-1", 1000n, {}, 7);

      expect(result.marketType).to.equal("sale");
      expect(t.market.getListing(REGISTRY, "tok-1")).to.deep.equal({
        owner: "alice",
        approvalId: 7,
        registry: REGISTRY,
        assetId: "tok-1",
        currency: "native",
        price: 1000n,
        bids: undefined,
        startedAt: undefined,
        endedAt: undefined,
        isAuction: undefined,
      });
      expect(t.market.reservationCount("alice")).to.equal(1);
    });

    it("starts auctions with an empty bid list", () => {
      list(t, "alice", "tok-1", 100n, { isAuction: true, endedAt: START + 60_000 });

      const listing = t.market.getListing(REGISTRY, "tok-1");
      expect(listing?.bids).to.deep.equal([]);
      expect(listing?.endedAt).to.equal(START + 60_000);
    });

    it("emits listing_created with amounts as strings", () => {
      list(t, "alice", "tok-1", 1000n);

      const [event] = t.market.events.ofKind("listing_created");
      expect(event.data).to.deep.equal({
        owner: "alice",
        approvalId: 1,
        registry: REGISTRY,
        assetId: "tok-1",
        currency: "native",
        price: "1000",
        startedAt: null,
        endedAt: null,
        isAuction: null,
      });
    });

    it("requires paid storage for one more reservation", () => {
      expectMarketError(
        () =>
          t.market.onApprove(by(REGISTRY, 0n, "alice"), {
            owner: "alice",
            assetId: "tok-1",
            approvalId: 1,
            msg: saleMessage(1000n),
          }),
        "INSUFFICIENT_STORAGE"
      );
      expect(t.market.getListing(REGISTRY, "tok-1")).to.equal(undefined);
    });

    it("rejects prices at or above the ceiling", () => {
      t.market.storageDeposit(by("alice", UNIT));
      const approve = (price: bigint) =>
        t.market.onApprove(by(REGISTRY, 0n, "alice"), {
          owner: "alice",
          assetId: "tok-1",
          approvalId: 1,
          msg: saleMessage(price),
        });

      expectMarketError(() => approve(MARKET_LIMITS.maxPrice), "INVALID_PRICE");
      expect(approve(MARKET_LIMITS.maxPrice - 1n).marketType).to.equal("sale");
    });

    it("rejects auction windows in the past or inverted", () => {
      t.market.storageDeposit(by("alice", UNIT));
      const approve = (extra: Record<string, unknown>) => () =>
        t.market.onApprove(by(REGISTRY, 0n, "alice"), {
          owner: "alice",
          assetId: "tok-1",
          approvalId: 1,
          msg: saleMessage(100n, { isAuction: true, ...extra }),
        });

      expectMarketError(approve({ startedAt: START - 1 }), "INVALID_WINDOW");
      expectMarketError(approve({ startedAt: START + 10, endedAt: START + 10 }), "INVALID_WINDOW");
      expectMarketError(approve({ endedAt: START - 1 }), "INVALID_WINDOW");
      expect(approve({ startedAt: START, endedAt: START + 1 })().marketType).to.equal("sale");
    });

    it("only accepts calls relayed by an approved registry for the owner", () => {
      t.market.storageDeposit(by("alice", UNIT));
      const notice = { owner: "alice", assetId: "tok-1", approvalId: 1, msg: saleMessage(10n) };

      expectMarketError(() => t.market.onApprove(by("rogue.test", 0n, "alice"), notice), "UNAPPROVED_REGISTRY");
      expectMarketError(() => t.market.onApprove(by("alice", 0n, "alice"), notice), "UNAUTHORIZED");
      expectMarketError(() => t.market.onApprove(by(REGISTRY), notice), "UNAUTHORIZED");
      expectMarketError(() => t.market.onApprove(by(REGISTRY, 0n, "bob"), notice), "UNAUTHORIZED");
    });

    it("rejects malformed approval messages", () => {
      t.market.storageDeposit(by("alice", UNIT));

      expectMarketError(
        () =>
          t.market.onApprove(by(REGISTRY, 0n, "alice"), {
            owner: "alice",
            assetId: "tok-1",
            approvalId: 1,
            msg: '{"marketType":"sale","price":12}',
          }),
        "INVALID_MESSAGE"
      );
    });

    it("re-listing replaces the old listing and refunds its bids", () => {
      list(t, "alice", "tok-1", 100n, { isAuction: true });
      t.market.storageDeposit(by("bob", UNIT));
      t.market.placeBid(by("bob", 150n), { registry: REGISTRY, assetId: "tok-1", currency: "native", amount: 150n });

      t.market.onApprove(by(REGISTRY, 0n, "alice"), {
        owner: "alice",
        assetId: "tok-1",
        approvalId: 2,
        msg: saleMessage(300n),
      });

      const listing = t.market.getListing(REGISTRY, "tok-1");
      expect(listing?.price).to.equal(300n);
      expect(listing?.approvalId).to.equal(2);
      expect(listing?.bids).to.equal(undefined);
      expect(t.market.reservationCount("alice")).to.equal(1);
      expect(t.ledger.balanceOf("bob")).to.equal(1_000_000n - UNIT);
    });
  });

  describe("updatePrice", () => {
    beforeEach(() => {
      list(t, "alice", "tok-1", 1000n);
    });

    it("lets the owner change the price with a one-unit deposit", () => {
      const updated = t.market.updatePrice(by("alice", 1n), REGISTRY, "tok-1", "native", 1200n);

      expect(updated.price).to.equal(1200n);
      expect(t.market.getListing(REGISTRY, "tok-1")?.price).to.equal(1200n);
      expect(t.ledger.balanceOf(MARKET)).to.equal(UNIT + 1n);
    });

    it("is owner-only and needs exactly one unit", () => {
      expectMarketError(() => t.market.updatePrice(by("bob", 1n), REGISTRY, "tok-1", "native", 1n), "UNAUTHORIZED");
      expectMarketError(() => t.market.updatePrice(by("alice"), REGISTRY, "tok-1", "native", 1n), "INVALID_DEPOSIT");
      expectMarketError(() => t.market.updatePrice(by("alice", 2n), REGISTRY, "tok-1", "native", 1n), "INVALID_DEPOSIT");
    });

    it("rejects a different currency or a price at the ceiling", () => {
      expectMarketError(() => t.market.updatePrice(by("alice", 1n), REGISTRY, "tok-1", "usd", 1n), "UNSUPPORTED_CURRENCY");
      expectMarketError(
        () => t.market.updatePrice(by("alice", 1n), REGISTRY, "tok-1", "native", MARKET_LIMITS.maxPrice),
        "INVALID_PRICE"
      );
      expect(t.market.getListing(REGISTRY, "tok-1")?.price).to.equal(1000n);
    });
  });

  describe("deleteListing", () => {
    beforeEach(() => {
      list(t, "alice", "tok-1", 1000n);
    });

    it("lets the owner delete and releases the reservation", () => {
      t.market.deleteListing(by("alice", 1n), REGISTRY, "tok-1");

      expect(t.market.getListing(REGISTRY, "tok-1")).to.equal(undefined);
      expect(t.market.reservationCount("alice")).to.equal(0);
      expect(t.market.events.ofKind("listing_deleted")).to.have.length(1);
    });

    it("lets the marketplace owner delete", () => {
      t.market.deleteListing(by(OWNER, 1n), REGISTRY, "tok-1");

      expect(t.market.getListing(REGISTRY, "tok-1")).to.equal(undefined);
    });

    it("rejects anyone else and unknown keys", () => {
      expectMarketError(() => t.market.deleteListing(by("bob", 1n), REGISTRY, "tok-1"), "UNAUTHORIZED");
      expectMarketError(() => t.market.deleteListing(by("alice", 1n), REGISTRY, "tok-2"), "NOT_FOUND");
    });
  });

  it("pages through listings", () => {
    list(t, "alice", "tok-1", 1n);
    list(t, "alice", "tok-2", 2n);
    list(t, "bob", "tok-3", 3n);

    expect(t.market.listListings(1, 5).map((l) => l.assetId)).to.deep.equal(["tok-2", "tok-3"]);
    expect(t.market.listListings(0, 1).map((l) => l.assetId)).to.deep.equal(["tok-1"]);
  });
});
