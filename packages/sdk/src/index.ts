// public api for @switchyard/sdk
// usage:
//   import { WorkerAgent, InMemoryTransport } from '@switchyard/sdk';
//   const agent = new WorkerAgent({ name: 'colombia', transport, capability });

export * from './types';
export * from './transport';
export { InMemoryTransport } from './memory-transport';
export { WorkerAgent } from './worker';
export type { WorkerAgentConfig } from './worker';
export {
    serialize,
    deserialize,
    encodeMessage,
    decodeMessage,
    isTaskMessage,
    isReplyMessage,
    SerializationError,
} from './utils/serialization';
