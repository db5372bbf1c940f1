export {
  DnsPropagationVerifier,
  createResolverLookup,
  type PropagationVerifier,
  type DnsPropagationVerifierOptions,
  type TxtLookup,
} from './propagation-verifier.js';
