export { TcpTransport, createTcpTransport } from './tcp.js';
export type { SpecTransport, TransportConfig } from './types.js';
