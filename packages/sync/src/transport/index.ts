/**
 * Remote table service access.
 *
 * {@link RemoteTransport} is what the push and pull operation managers
 * talk to; {@link HttpTransport} implements it over `fetch`.
 *
 * @module sync/transport
 */
export * from './http.js';
export * from './types.js';
