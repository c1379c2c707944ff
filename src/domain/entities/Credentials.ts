/**
 * Opaque service credentials. The client only turns them into an
 * `Authorization` header.
 */
export type Credentials =
  | { type: 'basic'; username: string; password: string }
  | { type: 'bearer'; token: string };
