export const NAME = 'fanout-bfs';
export const VERSION = '0.1.0';
