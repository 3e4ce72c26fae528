/**
 * Address Abbreviations
 *
 * Street suffixes and directionals expanded before addresses are compared,
 * so "456 Oak Ave" and "456 Oak Avenue" normalize to the same text.
 */

export const ADDRESS_ABBREVIATIONS: ReadonlyMap<string, string> = new Map([
  ['ave', 'avenue'],
  ['av', 'avenue'],
  ['st', 'street'],
  ['str', 'street'],
  ['rd', 'road'],
  ['blvd', 'boulevard'],
  ['dr', 'drive'],
  ['ln', 'lane'],
  ['ct', 'court'],
  ['pl', 'place'],
  ['ter', 'terrace'],
  ['cir', 'circle'],
  ['hwy', 'highway'],
  ['pkwy', 'parkway'],
  ['sq', 'square'],
  ['apt', 'apartment'],
  ['ste', 'suite'],
  ['n', 'north'],
  ['s', 'south'],
  ['e', 'east'],
  ['w', 'west'],
  ['ne', 'northeast'],
  ['nw', 'northwest'],
  ['se', 'southeast'],
  ['sw', 'southwest'],
]);
