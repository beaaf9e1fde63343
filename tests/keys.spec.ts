import { expect } from "chai";
import { isAccountId, KEY_DELIMITER, listingKey, offerKey } from "../offchain/src/market/keys";
import { ReservationIndex } from "../offchain/src/market/reservations";

describe("composite keys", () => {
  it("joins listing components with the delimiter", () => {
    expect(KEY_DELIMITER).to.equal("||");
    expect(listingKey("assets.test", "tok-1")).to.equal("assets.test||tok-1");
  });

  it("joins offer components as registry, buyer, asset", () => {
    expect(offerKey("assets.test", "bob", "tok-1")).to.equal("assets.test||bob||tok-1");
  });

  it("refuses account ids that would make two keys collide", () => {
    // "r||x" + "y" and "r" + "x||y" join to the same listing key
    expect(listingKey("r||x", "y")).to.equal(listingKey("r", "x||y"));
    expect(isAccountId("r||x")).to.equal(false);
    expect(isAccountId("")).to.equal(false);
    expect(isAccountId("r|x")).to.equal(true);
    expect(isAccountId("assets.test")).to.equal(true);
  });
});

describe("ReservationIndex", () => {
  it("counts listings and offers together per account", () => {
    const index = new ReservationIndex();
    index.addListing("alice", listingKey("r", "1"));
    index.addListing("alice", listingKey("r", "2"));
    index.addOffer("alice", offerKey("r", "alice", "3"));
    index.addOffer("bob", offerKey("r", "bob", "1"));

    expect(index.count("alice")).to.equal(3);
    expect(index.count("bob")).to.equal(1);
    expect(index.count("carol")).to.equal(0);
  });

  it("keeps the two namespaces apart", () => {
    const index = new ReservationIndex();
    index.addListing("alice", listingKey("r", "1"));

    expect(index.hasListing("alice", listingKey("r", "1"))).to.equal(true);
    expect(index.listingsOf("alice")).to.deep.equal(["r||1"]);
    expect(index.offersOf("alice")).to.deep.equal([]);
  });

  it("adding the same key twice holds one reservation", () => {
    const index = new ReservationIndex();
    index.addOffer("bob", offerKey("r", "bob", "1"));
    index.addOffer("bob", offerKey("r", "bob", "1"));

    expect(index.count("bob")).to.equal(1);
  });

  it("drops an account once its last key is removed", () => {
    const index = new ReservationIndex();
    index.addListing("alice", listingKey("r", "1"));
    index.addOffer("bob", offerKey("r", "bob", "1"));
    index.removeListing("alice", listingKey("r", "1"));
    index.removeListing("carol", listingKey("r", "9"));

    expect(index.count("alice")).to.equal(0);
    expect(index.accounts()).to.deep.equal(["bob"]);
  });
});
