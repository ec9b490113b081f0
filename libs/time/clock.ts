/**
 * Injectable time source. Tests pass a fixed or stepping clock.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
