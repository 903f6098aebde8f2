export * from './errors';
export * from './types';
export * from './build-id';
export * from './signature-verifier';
export * from './verified-fetch';
export * from './cache-store';
export * from './manifest-client';
export * from './platform-matcher';
export * from './artifact-client';
export * from './archive-extractor';
export * from './target';
export * from './toolchain';
export * from './fallback-policy';
