import WebSocket from 'ws';
import type { SocketFactory } from './OverlaySocket';

/** Socket factory over `ws`, for running an overlay client under Node. */
export const wsSocketFactory: SocketFactory = (url, handlers) => {
  const socket = new WebSocket(url, { perMessageDeflate: false });
  socket.on('open', () => handlers.onOpen());
  socket.on('message', (data, isBinary) => handlers.onMessage(isBinary ? null : data.toString()));
  socket.on('error', (err) => handlers.onError(err.message));
  socket.on('close', (code, reason) => handlers.onClose(code, reason.toString()));
  return {
    get isOpen() {
      return socket.readyState === WebSocket.OPEN;
    },
    send: (data) => socket.send(data),
    close: (code, reason) => {
      if (socket.readyState === WebSocket.CLOSED) return;
      socket.close(code, reason);
    },
  };
};
