import { MatchPair } from './types/matchmaking.types';

export class MatchFoundEvent {
  constructor(public readonly pair: MatchPair) {}
}
