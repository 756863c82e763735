// Closed method sets.
export { Constructors, construct, CONSTRUCTOR_TAGS } from './constructors';
export { NoisePolicies, resolveNoisePolicy } from './noise';
