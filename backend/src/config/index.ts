export * from './app.config';
export * from './game.config';
export * from './twitch.config';
