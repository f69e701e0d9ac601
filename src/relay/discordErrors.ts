import { RESTJSONErrorCodes } from "discord.js";
import { readErrorField } from "../utils.ts";
import type { MembershipResult } from "./types.ts";

const NOT_FOUND_CODES = new Set<number>([RESTJSONErrorCodes.UnknownMember, RESTJSONErrorCodes.UnknownUser]);
const DENIED_CODES = new Set<number>([RESTJSONErrorCodes.MissingAccess, RESTJSONErrorCodes.MissingPermissions]);

export function isPermissionDeniedError(error: unknown) {
  const code = readErrorField(error, "code");
  if (code !== null && DENIED_CODES.has(code)) return true;
  return readErrorField(error, "status") === 403;
}

export function classifyMemberLookupError(error: unknown): MembershipResult {
  const code = readErrorField(error, "code");
  if (code !== null && NOT_FOUND_CODES.has(code)) return "not_found";
  if (isPermissionDeniedError(error)) return "denied";
  if (readErrorField(error, "status") === 404) return "not_found";
  return "transport_error";
}
