export { Prober, isExpectedStatus, describeProbeError } from './Prober.js';
export type { ProberOptions } from './Prober.js';
export { createHealthCheck } from './types.js';
export type { HealthCheck } from './types.js';
export { UnknownCertificateInspector, TlsCertificateInspector } from './certificates.js';
export type { CertificateInspector } from './certificates.js';
export { randomUserAgent, hasUserAgent, USER_AGENTS } from './userAgents.js';
