import type { GachaEngine } from '../engine/GachaEngine';
import type { Logger } from '../utils/log';
import type { InboundMessage } from './messages';

export interface MessageSink {
  send(payload: object): boolean;
}

export type MessageRouter = (message: InboundMessage, reply: MessageSink) => void;

/** Bind parsed host messages to an engine instance. */
export function createMessageRouter(engine: GachaEngine, logger: Logger): MessageRouter {
  return (message, reply) => {
    switch (message.type) {
      case 'gacha_pulls':
        logger.debug('Pulls received', { pulls: message.pulls.length, user: message.meta.userId });
        if (message.pulls.length > 0) {
          void engine.enqueue(message.pulls, message.meta);
        } else {
          engine.clear();
        }
        break;
      case 'clear':
        engine.clear();
        break;
      case 'ping':
        reply.send({ type: 'pong', ts: message.ts });
        break;
      case 'unknown':
        logger.debug('Ignoring message', { type: message.rawType });
        break;
      case 'malformed':
        logger.warn('Dropped malformed frame', message.reason);
        break;
    }
  };
}
