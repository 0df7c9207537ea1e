export { IdentityVerifier } from './identity_verifier';
export type { Credentials, IdentityVerifierOptions } from './identity_verifier.types';
