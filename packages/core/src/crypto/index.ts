export { CryptoSealer, parseEncryptionKey, ensureSealingAvailable } from './sealer';
export type { EncryptionKey } from './sealer';
