/**
 * layerline - Speaker Example
 */

import { Person, sayLoud, SayFunction } from '../src/index';

export function runSpeakerDemo(sayFn: SayFunction = sayLoud): Person {
  const kip = new Person('Kip', sayFn);
  kip.introduceYourself();
  return kip;
}

if (require.main === module) {
  runSpeakerDemo();
}
