import type { Player } from './types.js';

export const otherPlayer = (player: Player): Player => (player === 'black' ? 'white' : 'black');
