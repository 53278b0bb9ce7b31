// src/modules/auth/types.ts

import type { ClientMeta } from "../../libs/http.js";
import type { Realm } from "../../libs/realm.js";
import type { Business } from "../businesses/types.js";
import type { OtpScope } from "../otp/types.js";
import type { TokenPair } from "../tokens/types.js";
import type { User } from "../users/types.js";

export interface ConfirmInput {
  phone: string;
  otp: string;
  realm?: Realm;
  business?: string | null;
  headerBusiness?: string | null;
  meta: ClientMeta;
}

export interface ConfirmResult {
  user: User;
  userCreated: boolean;
  scope: OtpScope;
  tokens: TokenPair;
}

export interface LoginInput {
  phone: string;
  password: string;
  meta: ClientMeta;
}

export interface LoginResult {
  user: User;
  businesses: Business[];
  tokens: TokenPair;
}
