/**
 * Debug namespaces
 *
 * Output is enabled through the DEBUG environment variable:
 *
 * DEBUG=acme-dns01:* - everything
 * DEBUG=acme-dns01:gateway - DNS provider calls only
 * DEBUG=acme-dns01:http,acme-dns01:nonce - ACME transport
 */

import debug from 'debug';

const ROOT = 'acme-dns01';

const createDebugger = (namespace: string): debug.Debugger => debug(`${ROOT}:${namespace}`);

export const debugHttp = createDebugger('http');
export const debugNonce = createDebugger('nonce');
export const debugAcme = createDebugger('acme');
export const debugOvh = createDebugger('ovh');
export const debugGateway = createDebugger('gateway');
export const debugPropagation = createDebugger('propagation');
export const debugOrchestrator = createDebugger('orchestrator');
export const debugCleanup = createDebugger('cleanup');
export const debugRetry = createDebugger('retry');
