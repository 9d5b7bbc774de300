export const EVENTS = {
  // matching events
  MATCH_FOUND: 'match.found',

  // Match lifecycle events
  MATCH_CREATED: 'match.created',
  MATCH_STARTED: 'match.started',
  MATCH_ENDED: 'match.ended',

  // Session events
  SESSION_DELIVERY_FAILED: 'session.delivery.failed',
};

/** socket.io event name carrying every client <-> server message */
export const WS_MESSAGE_EVENT = 'message';
