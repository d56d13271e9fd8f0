// Rule Kernel - family decision (v1)
//
// Decides from the classified source and destination which address families a
// declaration is emitted for. Rows are evaluated in order, first match wins:
//
//   v4 > 0, v6 = 0          -> v4 only
//   v4 = 0, v6 > 0          -> v6 only
//   v4 = 0, v6 = 0, bad > 0 -> fail (only invalid addresses)
//   v4 = 0, v6 = 0, bad = 0 -> both (no address restricts the family)
//   v4 > 0, v6 > 0          -> both
//
// Invalid tokens next to valid ones are skipped and reported, not fatal.

import type { AddressClassificationV1 } from "../address/address_classifier";

export interface AddressCountsV1 {
  v4: number;
  v6: number;
  other: number;
}

export type FamilyDecisionV1 =
  | {
      ok: true;
      emit_v4: boolean;
      emit_v6: boolean;

      // Unrecognized tokens excluded from both families (source first, then destination).
      skipped_invalid: string[];
    }
  | {
      ok: false;

      // Every supplied token; none of them is a valid address.
      invalid: string[];
    };

export function countAddressesV1(
  source: AddressClassificationV1,
  destination: AddressClassificationV1
): AddressCountsV1 {
  return {
    v4: source.v4.length + destination.v4.length,
    v6: source.v6.length + destination.v6.length,
    other: source.other.length + destination.other.length
  };
}

export function decideFamiliesV1(
  source: AddressClassificationV1,
  destination: AddressClassificationV1
): FamilyDecisionV1 {
  const counts = countAddressesV1(source, destination);
  const invalid = [...source.other, ...destination.other];

  if (counts.v4 > 0 && counts.v6 === 0) {
    return { ok: true, emit_v4: true, emit_v6: false, skipped_invalid: invalid };
  }

  if (counts.v4 === 0 && counts.v6 > 0) {
    return { ok: true, emit_v4: false, emit_v6: true, skipped_invalid: invalid };
  }

  if (counts.v4 === 0 && counts.v6 === 0) {
    if (counts.other > 0) {
      return { ok: false, invalid };
    }
    return { ok: true, emit_v4: true, emit_v6: true, skipped_invalid: [] };
  }

  return { ok: true, emit_v4: true, emit_v6: true, skipped_invalid: invalid };
}
