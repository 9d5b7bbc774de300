/** Injection token for the resolved GameConfig */
export const GAME_CONFIG = 'GAME_CONFIG';
