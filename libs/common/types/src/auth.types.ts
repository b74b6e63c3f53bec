/**
 * Todos Auth Types
 * Common types for authentication
 */

/**
 * Persisted user record. Created on signup, never mutated afterwards.
 */
export interface StoredIdentity {
  id: number;
  name: string;
  email: string;
  passwordDigest: string;
}

export interface NewIdentity {
  name: string;
  email: string;
  passwordDigest: string;
}

/**
 * The authenticated actor of a single request.
 */
export interface Principal {
  id: number;
  name: string;
  email: string;
}

export interface Credentials {
  email: string;
  password: string;
}
