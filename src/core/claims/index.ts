export * from './claims';
export { StandardClaims, standardClaimsSchema } from './standard';
export type { RegisteredClaims } from './standard';
