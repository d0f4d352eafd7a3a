/**
 * Types for the storefront backend
 */

/** Registered customer */
export interface User {
  id: number;
  username: string;
  email: string;
  password_hash: string; // pbkdf2:<iterations>:<salt>:<hash>
  dob: string | null; // YYYY-MM-DD
  phone_number: string | null;
  gender: Gender | null;
  created: string;
}

/** User without credential material, safe to return to clients */
export type PublicUser = Omit<User, "password_hash">;

export type Gender = "Male" | "Female" | "Other";

/** Product category */
export interface Category {
  id: number;
  product_type: string;
  age_group: string | null;
  gender: string | null;
}

/** Product in the catalog */
export interface Product {
  id: number;
  name: string;
  description: string;
  price: number; // in smallest currency unit (pence/paise)
  stock: number; // never negative
  image_url: string | null;
  category_id: number | null;
  created: string;
}

/** One (product, quantity) line in a user's cart */
export interface CartLine {
  id: number;
  user_id: number;
  product_id: number;
  quantity: number;
}

export type PaymentMode = "COD" | "Card" | "UPI";

export type PaymentStatus = "Pending" | "Paid" | "Cancelled";

/** Placed order; immutable apart from payment_status */
export interface Order {
  id: number;
  reference: string;
  user_id: number;
  total_price: number;
  payment_status: PaymentStatus;
  full_name: string;
  address: string;
  phone_number: string;
  city: string;
  postal_code: string;
  payment_mode: PaymentMode;
  created_at: string;
}

/** Order line with prices copied at commit time */
export interface OrderItem {
  id: number;
  order_id: number;
  product_id: number;
  quantity: number;
  unit_price: number;
  price: number; // unit_price * quantity
}

/** Customer review of a product */
export interface Review {
  id: number;
  product_id: number;
  user_id: number;
  rating: number; // 1..5
  review_text: string;
  created_at: string;
}

/** One-time code issued after a password check */
export type OtpChallenge = {
  readonly userId: number;
  readonly code: string;
  readonly issuedAt: number; // epoch ms
};

/** Login progress stored against a session token */
export type SessionState =
  | { readonly status: "anonymous" }
  | { readonly status: "otp_pending"; readonly challenge: OtpChallenge }
  | { readonly status: "authenticated"; readonly userId: number };
