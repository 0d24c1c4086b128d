import { EventEmitter } from 'eventemitter3';

/**
 * All typed events emitted by the discovery pipeline.
 * Keys are event names; values are the payload shape passed to listeners.
 */
export interface AppEvents {
  'discovery:started': {
    stage: 'search' | 'intermediary';
    url: string;
  };
  'discovery:completed': {
    stage: 'search' | 'intermediary';
    url: string;
    linksFound: number;
  };
  'giveaway:fetched': {
    giveawayId: string;
    url: string;
  };
  'giveaway:failed': {
    url: string;
    kind: 'timeout' | 'invalid_response';
    error: string;
  };
  'giveaway:updated': {
    giveawayId: string;
  };
}

export class TypedEventEmitter extends EventEmitter<AppEvents> {}

/**
 * Default emitter for stages that are not given one. Listeners only
 * observe; nothing in the pipeline reads state back from it.
 */
export const eventBus = new TypedEventEmitter();
