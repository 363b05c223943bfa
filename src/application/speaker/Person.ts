/**
 * layerline - Person
 */

import { say, type SayFunction } from './say';

/**
 * A person whose way of speaking is injected
 *
 * @example
 * ```typescript
 * const kip = new Person('Kip', sayLoud);
 * kip.introduceYourself(); // HI, MY NAME IS KIP.
 * ```
 */
export class Person {
  constructor(
    public readonly name: string,
    public sayFn: SayFunction = say,
  ) {}

  introduceYourself(): void {
    this.sayFn(`Hi, my name is ${this.name}.`);
  }
}
