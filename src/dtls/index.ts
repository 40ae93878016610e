/**
 * DTLS handshake pieces around the CertificateVerify message
 */

export * from './peer';
export * from './alert';
export * from './errors';
export * from './datagram';
export * from './algorithms';
export * from './handshake';
export * from './transcript';
export * from './transcript-signer';
export * from './transcript-verifier';
export * from './certificate-verify';
