// src/modules/businesses/service.ts

import { NotFoundError } from "../../libs/errors.js";
import type { AccessTokenPayload } from "../../libs/jwt.js";
import { toBusinessDto, type BusinessDto, type BusinessRepository } from "./types.js";

/** Business aus dem (mobile) Token. */
export async function getTokenBusiness(
  businesses: BusinessRepository,
  claims: AccessTokenPayload,
): Promise<BusinessDto> {
  const business = claims.biz ? await businesses.findByCode(claims.biz) : null;
  if (!business) throw new NotFoundError("Business not found");
  return toBusinessDto(business);
}

export async function listOwnedBusinesses(
  businesses: BusinessRepository,
  claims: AccessTokenPayload,
): Promise<BusinessDto[]> {
  const owned = await businesses.listByOwner(claims.sub);
  return owned.map(toBusinessDto);
}
