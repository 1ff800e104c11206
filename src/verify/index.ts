/**
 * Verification of emitted declarations.
 *
 * @packageDocumentation
 */

export {
  verifyDeclarations,
  type VerificationDiagnostic,
  type VerificationResult,
} from './declaration-verifier.js';
