/**
 * ======================================================================
 * MARKETPLACE REST API ROUTES
 * ======================================================================
 *
 * Every mutating route is one marketplace call. The caller comes from
 * X-Account-Id, registry callbacks also carry X-Signer-Id, and the
 * attached deposit is the `deposit` body field (decimal string).
 *
 * Endpoints:
 * - GET    /listings, /listings/:registry/:assetId
 * - POST   /listings/:registry/:assetId/buy
 * - POST   /listings/:registry/:assetId/bids
 * - POST   /listings/:registry/:assetId/bids/accept
 * - POST   /listings/:registry/:assetId/bids/cancel
 * - PATCH  /listings/:registry/:assetId
 * - DELETE /listings/:registry/:assetId
 * - POST   /approvals                      (registry callback)
 * - GET    /offers/:registry/:assetId[/:buyer]
 * - POST   /offers, /offers/accept
 * - DELETE /offers/:registry/:assetId
 * - POST   /storage/deposit, /storage/withdraw
 * - GET    /storage/:account
 * - GET    /config
 * - PUT    /config/fee, /config/treasury, /config/owner
 * - POST   /config/registries, /config/currencies (DELETE to revoke)
 * - GET    /settlements/:id[?wait=true]
 */

import { Router, Request, Response } from "express";
import { Marketplace } from "../market/marketplace";
import { Listing, Offer, SettlementRecord, SettlementTicket } from "../market/types";
import { asyncHandler, AppError, callContext, commonRules, validate } from "./middleware";

// ==========================================================================
// Serialization (bigint → decimal string)
// ==========================================================================

export function listingJson(listing: Listing) {
  return {
    owner: listing.owner,
    approvalId: listing.approvalId,
    registry: listing.registry,
    assetId: listing.assetId,
    currency: listing.currency,
    price: listing.price.toString(),
    bids: listing.bids?.map((bid) => ({ bidder: bid.bidder, price: bid.price.toString() })) ?? null,
    startedAt: listing.startedAt ?? null,
    endedAt: listing.endedAt ?? null,
    isAuction: listing.isAuction ?? false,
  };
}

export function offerJson(offer: Offer) {
  return {
    buyer: offer.buyer,
    registry: offer.registry,
    assetId: offer.assetId,
    currency: offer.currency,
    price: offer.price.toString(),
  };
}

function ticketJson(ticket: SettlementTicket) {
  return {
    settlementId: ticket.settlementId,
    buyer: ticket.buyer,
    price: ticket.price.toString(),
  };
}

export function settlementJson(record: SettlementRecord) {
  const { snapshot } = record;
  return {
    id: snapshot.id,
    source: snapshot.source,
    status: record.status,
    seller: snapshot.seller,
    buyer: snapshot.buyer,
    registry: snapshot.registry,
    assetId: snapshot.assetId,
    price: snapshot.price.toString(),
    royalties: record.royalties ?? null,
    failureReason: record.failureReason ?? null,
    transfers: record.transfers.map((t) => ({ to: t.to, amount: t.amount.toString(), reason: t.reason })),
    scheduledAt: snapshot.scheduledAt,
    resolvedAt: record.resolvedAt ?? null,
  };
}

// ==========================================================================
// Body access
// ==========================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(req: Request, name: string): unknown {
  const body: unknown = req.body;
  return isRecord(body) ? body[name] : undefined;
}

function text(req: Request, name: string): string {
  const value = field(req, name);
  if (typeof value !== "string") {
    throw new AppError(400, "validation_failed", `${name} must be a string`);
  }
  return value;
}

function optionalText(req: Request, name: string): string | undefined {
  const value = field(req, name);
  return value === undefined ? undefined : text(req, name);
}

function amount(req: Request, name: string): bigint {
  const value = text(req, name);
  if (!/^\d+$/.test(value)) {
    throw new AppError(400, "validation_failed", `${name} must be a numeric string`);
  }
  return BigInt(value);
}

function optionalAmount(req: Request, name: string): bigint | undefined {
  return field(req, name) === undefined ? undefined : amount(req, name);
}

function integer(req: Request, name: string): number {
  const value = field(req, name);
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw new AppError(400, "validation_failed", `${name} must be an integer`);
  }
  return value;
}

function accounts(req: Request, name: string): string[] {
  const value = field(req, name);
  if (!Array.isArray(value)) {
    throw new AppError(400, "validation_failed", `${name} must be a list`);
  }
  return value.filter((entry): entry is string => typeof entry === "string");
}

function queryInt(req: Request, name: string, fallback: number): number {
  const raw = req.query[name];
  if (typeof raw !== "string" || !/^\d+$/.test(raw)) {
    return fallback;
  }
  return Number(raw);
}

// ==========================================================================
// Router
// ==========================================================================

export function marketRoutes(market: Marketplace): Router {
  const router = Router();

  // ---------------------------------------------------------------- listings

  router.get("/listings", (req: Request, res: Response) => {
    const from = queryInt(req, "from", 0);
    const limit = Math.min(queryInt(req, "limit", 50), 100);
    res.json({ listings: market.listListings(from, limit).map(listingJson) });
  });

  router.get("/listings/:registry/:assetId", (req: Request, res: Response) => {
    const listing = market.getListing(req.params.registry, req.params.assetId);
    if (!listing) {
      throw new AppError(404, "not_found", "Listing does not exist");
    }
    res.json(listingJson(listing));
  });

  router.post(
    "/listings/:registry/:assetId/buy",
    validate([commonRules.amount("deposit"), commonRules.amount("price", false)]),
    (req: Request, res: Response) => {
      const ticket = market.buy(callContext(req), {
        registry: req.params.registry,
        assetId: req.params.assetId,
        currency: optionalText(req, "currency"),
        price: optionalAmount(req, "price"),
      });
      res.status(202).json(ticketJson(ticket));
    }
  );

  router.post(
    "/listings/:registry/:assetId/bids",
    validate([
      commonRules.amount("deposit"),
      commonRules.amount("amount"),
      commonRules.string("currency", 1, 64),
    ]),
    (req: Request, res: Response) => {
      const listing = market.placeBid(callContext(req), {
        registry: req.params.registry,
        assetId: req.params.assetId,
        currency: text(req, "currency"),
        amount: amount(req, "amount"),
      });
      res.status(201).json(listingJson(listing));
    }
  );

  router.post(
    "/listings/:registry/:assetId/bids/accept",
    validate([commonRules.amount("deposit")]),
    (req: Request, res: Response) => {
      const ticket = market.acceptBid(callContext(req), req.params.registry, req.params.assetId);
      res.status(202).json(ticketJson(ticket));
    }
  );

  router.post(
    "/listings/:registry/:assetId/bids/cancel",
    validate([commonRules.amount("deposit"), commonRules.account("account")]),
    (req: Request, res: Response) => {
      const listing = market.cancelBid(
        callContext(req),
        req.params.registry,
        req.params.assetId,
        text(req, "account")
      );
      res.json(listingJson(listing));
    }
  );

  router.patch(
    "/listings/:registry/:assetId",
    validate([
      commonRules.amount("deposit"),
      commonRules.amount("price"),
      commonRules.string("currency", 1, 64),
    ]),
    (req: Request, res: Response) => {
      const listing = market.updatePrice(
        callContext(req),
        req.params.registry,
        req.params.assetId,
        text(req, "currency"),
        amount(req, "price")
      );
      res.json(listingJson(listing));
    }
  );

  router.delete(
    "/listings/:registry/:assetId",
    validate([commonRules.amount("deposit")]),
    (req: Request, res: Response) => {
      const listing = market.deleteListing(callContext(req), req.params.registry, req.params.assetId);
      res.json(listingJson(listing));
    }
  );

  router.post(
    "/approvals",
    validate([
      commonRules.account("owner"),
      commonRules.string("assetId", 1, 128),
      commonRules.number("approvalId", 0),
      commonRules.string("msg", 2, 4096),
    ]),
    (req: Request, res: Response) => {
      const result = market.onApprove(callContext(req), {
        owner: text(req, "owner"),
        assetId: text(req, "assetId"),
        approvalId: integer(req, "approvalId"),
        msg: text(req, "msg"),
      });
      if (result.marketType === "sale") {
        res.status(201).json({ marketType: result.marketType, listing: listingJson(result.listing) });
      } else {
        res.status(202).json({ marketType: result.marketType, settlement: ticketJson(result.ticket) });
      }
    }
  );

  // ------------------------------------------------------------------ offers

  router.get("/offers/:registry/:assetId", (req: Request, res: Response) => {
    res.json({ offers: market.offersFor(req.params.registry, req.params.assetId).map(offerJson) });
  });

  router.get("/offers/:registry/:assetId/:buyer", (req: Request, res: Response) => {
    const offer = market.getOffer(req.params.registry, req.params.buyer, req.params.assetId);
    if (!offer) {
      throw new AppError(404, "not_found", "Offer does not exist");
    }
    res.json(offerJson(offer));
  });

  router.post(
    "/offers",
    validate([
      commonRules.amount("deposit"),
      commonRules.account("registry"),
      commonRules.string("assetId", 1, 128),
      commonRules.string("currency", 1, 64),
      commonRules.amount("price"),
    ]),
    (req: Request, res: Response) => {
      const offer = market.makeOffer(callContext(req), {
        registry: text(req, "registry"),
        assetId: text(req, "assetId"),
        currency: text(req, "currency"),
        price: amount(req, "price"),
      });
      res.status(201).json(offerJson(offer));
    }
  );

  router.post(
    "/offers/accept",
    validate([
      commonRules.account("seller"),
      commonRules.account("registry"),
      commonRules.account("buyer"),
      commonRules.string("assetId", 1, 128),
      commonRules.number("approvalId", 0),
      commonRules.amount("price"),
    ]),
    (req: Request, res: Response) => {
      const ticket = market.acceptOffer(callContext(req), {
        seller: text(req, "seller"),
        registry: text(req, "registry"),
        buyer: text(req, "buyer"),
        assetId: text(req, "assetId"),
        approvalId: integer(req, "approvalId"),
        price: amount(req, "price"),
      });
      res.status(202).json(ticketJson(ticket));
    }
  );

  router.delete(
    "/offers/:registry/:assetId",
    validate([commonRules.amount("deposit")]),
    (req: Request, res: Response) => {
      const offer = market.cancelOffer(callContext(req), req.params.registry, req.params.assetId);
      res.json(offerJson(offer));
    }
  );

  // ----------------------------------------------------------------- storage

  router.post(
    "/storage/deposit",
    validate([commonRules.amount("deposit"), commonRules.account("account", false)]),
    (req: Request, res: Response) => {
      const balance = market.storageDeposit(callContext(req), optionalText(req, "account"));
      res.json({ balance: balance.toString() });
    }
  );

  router.post(
    "/storage/withdraw",
    validate([commonRules.amount("deposit")]),
    (req: Request, res: Response) => {
      const refunded = market.storageWithdraw(callContext(req));
      res.json({ refunded: refunded.toString() });
    }
  );

  router.get("/storage/:account", (req: Request, res: Response) => {
    const { account } = req.params;
    res.json({
      account,
      balance: market.storageBalanceOf(account).toString(),
      minimum: market.storageMinimumBalance().toString(),
      reservations: market.reservationCount(account),
    });
  });

  // ------------------------------------------------------------------ config

  router.get("/config", (_req: Request, res: Response) => {
    res.json({
      owner: market.getOwner(),
      treasury: market.getTreasury(),
      transactionFeeBps: market.getTransactionFee(),
      approvedRegistries: market.approvedRegistries(),
      approvedCurrencies: market.approvedCurrencies(),
    });
  });

  router.put(
    "/config/fee",
    validate([commonRules.amount("deposit"), commonRules.number("feeBps", 0)]),
    (req: Request, res: Response) => {
      market.setTransactionFee(callContext(req), integer(req, "feeBps"));
      res.json({ transactionFeeBps: market.getTransactionFee() });
    }
  );

  router.put(
    "/config/treasury",
    validate([commonRules.amount("deposit"), commonRules.account("treasury")]),
    (req: Request, res: Response) => {
      market.setTreasury(callContext(req), text(req, "treasury"));
      res.json({ treasury: market.getTreasury() });
    }
  );

  router.put(
    "/config/owner",
    validate([commonRules.amount("deposit"), commonRules.account("owner")]),
    (req: Request, res: Response) => {
      market.transferOwnership(callContext(req), text(req, "owner"));
      res.json({ owner: market.getOwner() });
    }
  );

  router.post(
    "/config/registries",
    validate([commonRules.amount("deposit"), commonRules.accountList("registries")]),
    (req: Request, res: Response) => {
      market.addApprovedRegistries(callContext(req), accounts(req, "registries"));
      res.json({ approvedRegistries: market.approvedRegistries() });
    }
  );

  router.delete(
    "/config/registries",
    validate([commonRules.amount("deposit"), commonRules.accountList("registries")]),
    (req: Request, res: Response) => {
      market.removeApprovedRegistries(callContext(req), accounts(req, "registries"));
      res.json({ approvedRegistries: market.approvedRegistries() });
    }
  );

  router.post(
    "/config/currencies",
    validate([commonRules.amount("deposit"), commonRules.accountList("currencies")]),
    (req: Request, res: Response) => {
      market.addApprovedCurrencies(callContext(req), accounts(req, "currencies"));
      res.json({ approvedCurrencies: market.approvedCurrencies() });
    }
  );

  router.delete(
    "/config/currencies",
    validate([commonRules.amount("deposit"), commonRules.accountList("currencies")]),
    (req: Request, res: Response) => {
      market.removeApprovedCurrencies(callContext(req), accounts(req, "currencies"));
      res.json({ approvedCurrencies: market.approvedCurrencies() });
    }
  );

  // ------------------------------------------------------------- settlements

  router.get(
    "/settlements/:id",
    asyncHandler(async (req: Request, res: Response) => {
      const record =
        req.query.wait === "true" ? await market.whenSettled(req.params.id) : market.settlement(req.params.id);
      if (!record) {
        throw new AppError(404, "not_found", "Settlement does not exist");
      }
      res.json(settlementJson(record));
    })
  );

  return router;
}
