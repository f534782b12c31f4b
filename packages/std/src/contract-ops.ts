/**
 * Quilt stdlib: contract and label operations
 * contract.apply, contract.blame, contract.from_predicate, ...
 */
import { fromPrim } from "./prim-alias.js";

export const contractApplyFn = fromPrim("contract.apply", "contract/apply");
export const contractBlameFn = fromPrim("contract.blame", "contract/blame");
export const contractBlameWithMessageFn = fromPrim("contract.blame_with_message", "contract/blame_with_message");
export const contractFromPredicateFn = fromPrim("contract.from_predicate", "contract/from_predicate");
export const contractFromValidatorFn = fromPrim("contract.from_validator", "contract/from_validator");
export const contractAnyOfFn = fromPrim("contract.any_of", "contract/any_of");
export const contractLabelWithMessageFn = fromPrim("contract.label_with_message", "label/with_message");
export const contractLabelWithNotesFn = fromPrim("contract.label_with_notes", "label/with_notes");
