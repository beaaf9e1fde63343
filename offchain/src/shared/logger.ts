import debug from "debug";

export const log = {
  info: debug("market:info"),
  warn: debug("market:warn"),
  error: debug("market:error"),
  debug: debug("market:debug")
};

export const logger = log;

// in dev, enable via env: DEBUG=market:*
