export { derivePoolPrices, isValidSqrtPrice } from './poolPriceDeriver';
export {
    normalizeReferencePrice,
    readReferencePrice,
} from './priceReferenceAdapter';
export type { OracleCollaborator, ReferencePrice } from './priceReferenceAdapter';
