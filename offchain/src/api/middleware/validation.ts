/**
 * Input Validation Middleware
 *
 * Provides request validation for API routes
 */

import { Request, Response, NextFunction } from "express";
import { logger } from "../../shared/logger";
import { isAccountId, KEY_DELIMITER } from "../../market/keys";

export interface ValidationRule {
  field: string;
  required?: boolean;
  type?: "string" | "number" | "boolean" | "array" | "object";
  min?: number;
  max?: number;
  pattern?: RegExp;
  custom?: (value: unknown) => boolean | string; // Return true if valid, or error message string
  location?: "body" | "query" | "params"; // Where to look for the field
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sourceOf(req: Request, location: ValidationRule["location"]): Record<string, unknown> {
  const source: unknown = location === "query" ? req.query : location === "params" ? req.params : req.body;
  return isRecord(source) ? source : {};
}

/**
 * Validate request based on rules
 */
export function validate(rules: ValidationRule[]) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const errors: string[] = [];

    for (const rule of rules) {
      const value = sourceOf(req, rule.location)[rule.field];

      if (value === undefined || value === null || value === "") {
        if (rule.required) {
          errors.push(`${rule.field} is required`);
        }
        continue;
      }

      if (rule.type) {
        const actualType = Array.isArray(value) ? "array" : typeof value;
        if (actualType !== rule.type) {
          errors.push(`${rule.field} must be of type ${rule.type}, got ${actualType}`);
          continue;
        }
      }

      // Check min/max for numbers
      if (typeof value === "number") {
        if (rule.min !== undefined && value < rule.min) {
          errors.push(`${rule.field} must be at least ${rule.min}`);
        }
        if (rule.max !== undefined && value > rule.max) {
          errors.push(`${rule.field} must be at most ${rule.max}`);
        }
      }

      // Check string length
      if (typeof value === "string") {
        if (rule.min !== undefined && value.length < rule.min) {
          errors.push(`${rule.field} must be at least ${rule.min} characters`);
        }
        if (rule.max !== undefined && value.length > rule.max) {
          errors.push(`${rule.field} must be at most ${rule.max} characters`);
        }
        if (rule.pattern && !rule.pattern.test(value)) {
          errors.push(`${rule.field} format is invalid`);
        }
      }

      if (rule.custom) {
        const result = rule.custom(value);
        if (result !== true) {
          errors.push(result || `${rule.field} validation failed`);
        }
      }
    }

    if (errors.length > 0) {
      logger.warn("Validation failed", {
        path: req.path,
        errors,
      });

      res.status(400).json({
        error: "validation_failed",
        message: "Input validation failed",
        errors,
      });
      return;
    }

    next();
  };
}

/**
 * Validate numeric string (for bigint inputs)
 */
export function validateNumericString(value: unknown): boolean | string {
  if (typeof value !== "string") {
    return "must be a string";
  }
  if (!/^\d+$/.test(value)) {
    return "must be a numeric string";
  }
  return true;
}

/**
 * Common validation rules
 */
export const commonRules = {
  /** Ledger account id: the registry, buyer and owner fields */
  account: (field: string, required = true, location: ValidationRule["location"] = "body"): ValidationRule => ({
    field,
    required,
    location,
    type: "string",
    min: 1,
    max: 64,
    custom: (value) =>
      typeof value === "string" && isAccountId(value) ? true : `${field} must not contain "${KEY_DELIMITER}"`,
  }),

  amount: (field: string, required = true): ValidationRule => ({
    field,
    required,
    type: "string",
    custom: (value) => validateNumericString(value),
  }),

  number: (field: string, min?: number, max?: number, required = true): ValidationRule => ({
    field,
    required,
    type: "number",
    min,
    max,
  }),

  string: (field: string, minLength?: number, maxLength?: number, required = true): ValidationRule => ({
    field,
    required,
    type: "string",
    min: minLength,
    max: maxLength,
  }),

  accountList: (field: string): ValidationRule => ({
    field,
    required: true,
    type: "array",
    custom: (value) =>
      Array.isArray(value) && value.length > 0 && value.every((entry) => typeof entry === "string" && isAccountId(entry))
        ? true
        : `${field} must be a non-empty list of accounts`,
  }),
};
