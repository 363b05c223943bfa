/**
 * layerline - Say Functions
 *
 * Stateless behaviors registered by reference on a Person.
 */

/**
 * Something that says a message
 */
export type SayFunction = (message: string) => void;

/**
 * Print the message as is
 */
export function say(message: string): void {
  console.log(message);
}

/**
 * Print the message upper-cased
 */
export function sayLoud(message: string): void {
  console.log(message.toUpperCase());
}

/**
 * Say nothing
 */
export function sayMute(_message: string): void {}
