export { MemoryChannel, MemoryConnector, MemoryTransport } from './transport.js';
