// src/modules/businesses/types.ts

export interface BusinessRow {
  id: string;
  code: string;
  name: string;
  owner_id: string | null;
  created_at: Date;
}

export interface Business {
  id: string;
  code: string;
  name: string;
  ownerId: string | null;
  createdAt: Date;
}

export interface CreateBusinessInput {
  code: string;
  name: string;
  ownerId: string | null;
}

export interface BusinessRepository {
  findByCode(code: string): Promise<Business | null>;
  listByOwner(ownerId: string): Promise<Business[]>;
  create(input: CreateBusinessInput, now: Date): Promise<Business>;
}

export interface BusinessDto {
  code: string;
  name: string;
}

export function toBusinessDto(business: Business): BusinessDto {
  return { code: business.code, name: business.name };
}

// Business-Codes: kurz, Grossbuchstaben + Ziffern (Spalte varchar(12))
export const BUSINESS_CODE_RE = /^[A-Z0-9]{1,12}$/;
