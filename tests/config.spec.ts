import { expect } from "chai";
import { ConfigError, loadConfig } from "../offchain/src/shared/config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).to.deep.equal({
      port: 4000,
      production: false,
      marketAccount: "market",
      owner: "market-owner",
      treasury: "market-owner",
      transactionFeeBps: 200,
      approvedRegistries: [],
      registryUrlTemplate: undefined,
      databaseUrl: undefined,
      redisUrl: undefined,
      apiKeys: [],
      rateLimit: { windowSeconds: 60, perIp: 100, perAccount: 300 },
    });
  });

  it("reads rate limits or turns them off", () => {
    expect(loadConfig({ RATE_LIMIT_PER_IP: "5", RATE_LIMIT_WINDOW_SECONDS: "10" }).rateLimit).to.deep.equal({
      windowSeconds: 10,
      perIp: 5,
      perAccount: 300,
    });
    expect(loadConfig({ RATE_LIMIT_ENABLED: "false" }).rateLimit).to.equal(null);
    expect(() => loadConfig({ RATE_LIMIT_PER_ACCOUNT: "0" })).to.throw(ConfigError, "RATE_LIMIT_PER_ACCOUNT");
  });

  it("reads every variable", () => {
    const config = loadConfig({
      PORT: "8080",
      NODE_ENV: "production",
      MARKET_ACCOUNT: "escrow.test",
      MARKET_OWNER: "owner.test",
      MARKET_TREASURY: "vault.test",
      TRANSACTION_FEE_BPS: "250",
      APPROVED_REGISTRIES: "assets.test, art.test,,",
      REGISTRY_URL_TEMPLATE: "http://{registry}.registry.local",
      DATABASE_URL: "postgres://localhost/market",
      REDIS_URL: "redis://localhost:6379",
      API_KEYS: "test-key-1,test-key-2",
    });

    expect(config.port).to.equal(8080);
    expect(config.production).to.equal(true);
    expect(config.treasury).to.equal("vault.test");
    expect(config.transactionFeeBps).to.equal(250);
    expect(config.approvedRegistries).to.deep.equal(["assets.test", "art.test"]);
    expect(config.apiKeys).to.deep.equal(["test-key-1", "test-key-2"]);
    expect(config.registryUrlTemplate).to.equal("http://{registry}.registry.local");
  });

  it("rejects a fee of 100% or more", () => {
    expect(() => loadConfig({ TRANSACTION_FEE_BPS: "10000" })).to.throw(ConfigError, "TRANSACTION_FEE_BPS");
  });

  it("rejects non-numeric ports", () => {
    expect(() => loadConfig({ PORT: "http" })).to.throw(ConfigError, "expected an integer");
  });

  it("requires the registry placeholder in the URL template", () => {
    expect(() => loadConfig({ REGISTRY_URL_TEMPLATE: "http://registry.local" })).to.throw(
      ConfigError,
      "{registry}"
    );
  });
});
