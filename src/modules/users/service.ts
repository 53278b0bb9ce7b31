// src/modules/users/service.ts
// ============================================================================
// Profil des Aufrufers je Realm
// - mobile: User als Client des Token-Business
// - web:    User mit eigenen Businesses
// ============================================================================

import { NotFoundError } from "../../libs/errors.js";
import type { AccessTokenPayload } from "../../libs/jwt.js";
import {
  toBusinessDto,
  type BusinessDto,
  type BusinessRepository,
} from "../businesses/types.js";
import { toUserDto, type User, type UserDto, type UserRepository } from "./types.js";

export type ProfileDeps = {
  users: UserRepository;
  businesses: BusinessRepository;
};

export interface MobileProfile {
  user: UserDto;
  business: BusinessDto;
  client: { registered_at: string };
}

export interface WebProfile {
  user: UserDto;
  businesses: BusinessDto[];
}

async function requireUser(users: UserRepository, claims: AccessTokenPayload): Promise<User> {
  const user = await users.findById(claims.sub);
  if (!user) throw new NotFoundError("User not found");
  return user;
}

export async function getMobileProfile(
  deps: ProfileDeps,
  claims: AccessTokenPayload,
): Promise<MobileProfile> {
  const user = await requireUser(deps.users, claims);

  const business = claims.biz ? await deps.businesses.findByCode(claims.biz) : null;
  if (!business) throw new NotFoundError("Business not found");

  const client = await deps.users.findClient(user.id, business.id);
  if (!client) throw new NotFoundError("Client not found");

  return {
    user: toUserDto(user),
    business: toBusinessDto(business),
    client: { registered_at: client.registeredAt.toISOString() },
  };
}

export async function getWebProfile(
  deps: ProfileDeps,
  claims: AccessTokenPayload,
): Promise<WebProfile> {
  const user = await requireUser(deps.users, claims);
  const owned = await deps.businesses.listByOwner(user.id);
  return { user: toUserDto(user), businesses: owned.map(toBusinessDto) };
}
