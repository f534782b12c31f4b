/**
 * @quilt/std - Quilt Standard Library
 */
import type { NativeFn } from "@quilt/core";
export {
  recordInsertFn, recordInsertWithOptsFn, recordRemoveFn, recordRemoveWithOptsFn, recordUpdateFn,
  recordFreezeFn, recordHasFieldFn, recordFieldsFn, recordValuesFn, recordGetFn,
  recordMapFn, recordToArrayFn, recordFromArrayFn, recordIsEmptyFn,
} from "./record-ops.js";
export {
  contractApplyFn, contractBlameFn, contractBlameWithMessageFn, contractFromPredicateFn,
  contractFromValidatorFn, contractAnyOfFn, contractLabelWithMessageFn, contractLabelWithNotesFn,
} from "./contract-ops.js";
export {
  arrayLengthFn, arrayAtFn, arrayFirstFn, arrayLastFn, arrayMapFn, arrayFilterFn, arrayFoldLeftFn,
  arrayConcatFn, arrayAllFn, arrayAnyFn, arrayElemFn, arrayGenerateFn, arrayRangeFn, arraySortFn,
} from "./array-ops.js";
export {
  stringLengthFn, stringCharactersFn, stringSubstringFn, stringUppercaseFn, stringLowercaseFn,
  stringSplitFn, stringJoinFn, stringTrimFn, stringContainsFn, stringFromFn, stringToNumberFn,
} from "./string-ops.js";
export { numberAbsFn, numberFloorFn, numberCeilFn, numberMaxFn, numberMinFn, numberIsIntegerFn } from "./number-ops.js";
export {
  typeofFn, seqFn, deepSeqFn, failWithFn,
  isNumberFn, isStringFn, isBoolFn, isRecordFn, isArrayFn, isFunctionFn, isEnumFn,
} from "./predicates.js";

import {
  recordInsertFn, recordInsertWithOptsFn, recordRemoveFn, recordRemoveWithOptsFn, recordUpdateFn,
  recordFreezeFn, recordHasFieldFn, recordFieldsFn, recordValuesFn, recordGetFn,
  recordMapFn, recordToArrayFn, recordFromArrayFn, recordIsEmptyFn,
} from "./record-ops.js";
import {
  contractApplyFn, contractBlameFn, contractBlameWithMessageFn, contractFromPredicateFn,
  contractFromValidatorFn, contractAnyOfFn, contractLabelWithMessageFn, contractLabelWithNotesFn,
} from "./contract-ops.js";
import {
  arrayLengthFn, arrayAtFn, arrayFirstFn, arrayLastFn, arrayMapFn, arrayFilterFn, arrayFoldLeftFn,
  arrayConcatFn, arrayAllFn, arrayAnyFn, arrayElemFn, arrayGenerateFn, arrayRangeFn, arraySortFn,
} from "./array-ops.js";
import {
  stringLengthFn, stringCharactersFn, stringSubstringFn, stringUppercaseFn, stringLowercaseFn,
  stringSplitFn, stringJoinFn, stringTrimFn, stringContainsFn, stringFromFn, stringToNumberFn,
} from "./string-ops.js";
import { numberAbsFn, numberFloorFn, numberCeilFn, numberMaxFn, numberMinFn, numberIsIntegerFn } from "./number-ops.js";
import {
  typeofFn, seqFn, deepSeqFn, failWithFn,
  isNumberFn, isStringFn, isBoolFn, isRecordFn, isArrayFn, isFunctionFn, isEnumFn,
} from "./predicates.js";

/**
 * Get all stdlib functions as a Map, keyed by dotted name (`record.insert`).
 * The evaluator exposes them as the nested `std` record.
 */
export function getStdlibFns(): Map<string, NativeFn> {
  const fns = new Map<string, NativeFn>();
  for (const fn of [
    recordInsertFn, recordInsertWithOptsFn, recordRemoveFn, recordRemoveWithOptsFn, recordUpdateFn,
    recordFreezeFn, recordHasFieldFn, recordFieldsFn, recordValuesFn, recordGetFn,
    recordMapFn, recordToArrayFn, recordFromArrayFn, recordIsEmptyFn,
    contractApplyFn, contractBlameFn, contractBlameWithMessageFn, contractFromPredicateFn,
    contractFromValidatorFn, contractAnyOfFn, contractLabelWithMessageFn, contractLabelWithNotesFn,
    arrayLengthFn, arrayAtFn, arrayFirstFn, arrayLastFn, arrayMapFn, arrayFilterFn, arrayFoldLeftFn,
    arrayConcatFn, arrayAllFn, arrayAnyFn, arrayElemFn, arrayGenerateFn, arrayRangeFn, arraySortFn,
    stringLengthFn, stringCharactersFn, stringSubstringFn, stringUppercaseFn, stringLowercaseFn,
    stringSplitFn, stringJoinFn, stringTrimFn, stringContainsFn, stringFromFn, stringToNumberFn,
    numberAbsFn, numberFloorFn, numberCeilFn, numberMaxFn, numberMinFn, numberIsIntegerFn,
    typeofFn, seqFn, deepSeqFn, failWithFn,
    isNumberFn, isStringFn, isBoolFn, isRecordFn, isArrayFn, isFunctionFn, isEnumFn,
  ]) {
    fns.set(fn.name, fn);
  }
  return fns;
}
