export { ExecutionEventBusChannel } from './eventBusChannel.js';
export { ServerSentEventsChannel, SSE_HEADERS, formatSseFrame, type SseSink } from './sseChannel.js';
export { createCallbackChannel, type PushCallback } from './callbackChannel.js';
