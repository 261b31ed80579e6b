export type { U32, U64, U128 } from './hash/bits';
export type { Hasher, HasherFactory } from './hash/types';

export {
  fnv1_32, fnv1a_32, fnv1_64, fnv1a_64, fnv1aHex,
  FnvHasher, createFnv1_32, createFnv1a_32, createFnv1_64, createFnv1a_64,
  FNV1_32, FNV1A_32, FNV1_64, FNV1A_64,
} from './hash/fnv';
export type { FnvOrder, FnvParams } from './hash/fnv';
export { murmurhash3_32, MurmurHasher32, createMurmur3_32 } from './hash/murmur3_32';
export { murmurhash3_128, murmurhash3_128_low64, MurmurHasher128, createMurmur3_128 } from './hash/murmur3_128';
export { cityHash64, cityHash64WithSeed, cityHash64WithSeeds, CityHasher64, createCity64 } from './hash/city';
export { ProviderRegistry, nativeProvider, NATIVE_PROVIDER_NAME, HASH_FUNCTION_NAMES } from './hash/providers';
export type { HashProvider, HashFunctionName, ProviderMismatch, CompareOptions } from './hash/providers';

export {
  RendezvousSelector,
  rendezvousWithFnv1a64, rendezvousWithMurmur3_32, rendezvousWithMurmur3_128, rendezvousWithCity64,
} from './rendezvous/rendezvous';
export type { RendezvousOptions, NodeEncoder } from './rendezvous/rendezvous';
export { writeKey, encodeKey } from './rendezvous/key_encoding';
export type { HashKey, ByteSink } from './rendezvous/key_encoding';

export { avalancheMatrix, worstBias } from './analysis/avalanche';
export type { AvalancheMatrix, AvalancheOptions, AnyHashFn } from './analysis/avalanche';
export { bucketDistribution } from './analysis/distribution';
export type { BucketDistribution } from './analysis/distribution';
export { renderAvalanchePng, avalancheToPng } from './analysis/png';

export { resolveConfig, DEFAULT_CONFIG } from './config';
export type { HashmixConfig, RendezvousPolicy, Env } from './config';
export { createLogger } from './utils/log';
export type { Logger } from './utils/log';
export { toHex32, toHex64, toHex128 } from './utils/hex';
export { KeyEncodingError, UnknownProviderError, DuplicateProviderError, AnalysisConfigError } from './errors';
