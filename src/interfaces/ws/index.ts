export { WebSocketServer, DEFAULT_SOCKET_PATH, DEFAULT_MAX_PAYLOAD_BYTES } from './websocket-server.js';
export type { WebSocketServerOptions } from './websocket-server.js';
export { default as liveChannelPlugin } from './live-channel-plugin.js';
export type { LiveChannel, LiveChannelOptions } from './live-channel-plugin.js';
