export {
  collectPolymorphicPairs,
  findConfirmedPrefixes,
  findCorroboratedPrefixes,
  resolvePolymorphicPairs,
  CORROBORATION_CATEGORIES,
  type PolymorphicPair,
  type PolymorphicResolution,
  type ResolvedPolymorphicPair,
} from './polymorphic-resolver.js';
export { PolymorphicScanner } from './polymorphic-scanner.js';
