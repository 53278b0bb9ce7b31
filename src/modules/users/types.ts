// src/modules/users/types.ts
// ============================================================================
// Typen fuer User und Business-Clients
// ----------------------------------------------------------------------------
// - Row-Typen spiegeln die Tabellen users / business_clients
// - Domain-Typen sind camelCase und werden von Services genutzt
// ============================================================================

export interface UserRow {
  id: string;
  phone: string;
  is_admin: boolean;
  password_hash: string | null;
  created_at: Date;
}

export interface BusinessClientRow {
  id: string;
  user_id: string;
  business_id: string;
  business_code: string;
  registered_at: Date;
}

export interface User {
  id: string;
  phone: string;
  isAdmin: boolean;
  passwordHash: string | null;
  createdAt: Date;
}

export interface BusinessClient {
  id: string;
  userId: string;
  businessId: string;
  businessCode: string;
  registeredAt: Date;
}

export interface UserRepository {
  findById(id: string): Promise<User | null>;
  findByPhone(phone: string): Promise<User | null>;
  /** Legt den User an, falls die Telefonnummer noch unbekannt ist. */
  getOrCreateByPhone(phone: string, now: Date): Promise<{ user: User; created: boolean }>;
  setPassword(userId: string, passwordHash: string): Promise<void>;

  findClient(userId: string, businessId: string): Promise<BusinessClient | null>;
  getOrCreateClient(
    userId: string,
    business: { id: string; code: string },
    now: Date,
  ): Promise<{ client: BusinessClient; created: boolean }>;
}

export interface UserDto {
  id: string;
  phone: string;
  is_admin: boolean;
  created_at: string;
}

export function toUserDto(user: User): UserDto {
  return {
    id: user.id,
    phone: user.phone,
    is_admin: user.isAdmin,
    created_at: user.createdAt.toISOString(),
  };
}
