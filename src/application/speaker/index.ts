/**
 * layerline - Speaker Module
 */

export { Person } from './Person';
export { say, sayLoud, sayMute } from './say';
export type { SayFunction } from './say';
