import { AccountId } from "../shared/types";
import { isAccountId, KEY_DELIMITER } from "./keys";
import { fail } from "./types";

export type ApprovalMessage =
  | {
      marketType: "sale";
      price: bigint;
      currency?: string;
      startedAt?: number;
      endedAt?: number;
      isAuction?: boolean;
    }
  | {
      marketType: "accept_offer";
      buyer: AccountId;
      price: bigint;
    };

export interface ApprovalNotice {
  owner: AccountId;
  assetId: string;
  approvalId: number;
  /** JSON approval message, see ApprovalMessage */
  msg: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function amount(value: unknown): bigint {
  if (typeof value !== "string" || !/^\d+$/.test(value)) {
    fail("INVALID_MESSAGE", "price must be a decimal string");
  }
  return BigInt(value);
}

function optionalTime(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    fail("INVALID_MESSAGE", `${field} must be an integer timestamp`);
  }
  return value;
}

/**
 * Decode the message an owner attaches when approving the marketplace on a
 * registry.
 */
export function parseApprovalMessage(msg: string): ApprovalMessage {
  let decoded: unknown;
  try {
    decoded = JSON.parse(msg);
  } catch {
    fail("INVALID_MESSAGE", "Approval message is not valid JSON");
  }
  if (!isRecord(decoded)) {
    fail("INVALID_MESSAGE", "Approval message must be an object");
  }

  switch (decoded.marketType) {
    case "sale": {
      const { currency, isAuction } = decoded;
      if (currency !== undefined && typeof currency !== "string") {
        fail("INVALID_MESSAGE", "currency must be a string");
      }
      if (isAuction !== undefined && typeof isAuction !== "boolean") {
        fail("INVALID_MESSAGE", "isAuction must be a boolean");
      }
      return {
        marketType: "sale",
        price: amount(decoded.price),
        currency,
        startedAt: optionalTime(decoded.startedAt, "startedAt"),
        endedAt: optionalTime(decoded.endedAt, "endedAt"),
        isAuction,
      };
    }
    case "accept_offer": {
      const { buyer } = decoded;
      if (typeof buyer !== "string" || buyer.length === 0) {
        fail("INVALID_MESSAGE", "buyer is required");
      }
      if (!isAccountId(buyer)) {
        fail("INVALID_MESSAGE", `buyer must not contain "${KEY_DELIMITER}"`);
      }
      return { marketType: "accept_offer", buyer, price: amount(decoded.price) };
    }
    default:
      return fail("INVALID_MESSAGE", `Unknown marketType ${String(decoded.marketType)}`);
  }
}
