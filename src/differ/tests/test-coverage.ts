/**
 * Differ test coverage map.
 *
 * This file is the single source of truth for which suites cover which
 * behavioral areas. Keep entries aligned with the suite filenames and update
 * them whenever coverage scope changes.
 */
export const TEST_STRATEGY = [
  '1. Basic operations: ADD/DELETE/UPDATE on scalars and maps, idempotence, null vs empty, reserved and undeclared keys.',
  '   Covered in diff.basic-operations.test.ts.',
  '2. Lists: positional alignment, common prefix/suffix, tails, nested elements.',
  '   Covered in diff.lists.test.ts.',
  '3. Sets: permutation invariance, dedup, insertion, hash-rank pairing, pending members.',
  '   Covered in diff.sets.test.ts.',
  '4. Singleton collapse: collapsed and array forms, empty <-> populated transitions.',
  '   Covered in diff.singleton.test.ts.',
  '5. Unknown and computed values: monotonicity, provider-owned attributes.',
  '   Covered in diff.unknowns.test.ts.',
  '6. Replacement: forceNew ancestry, forceNew descendants, replaceOverride.',
  '   Covered in diff.replace.test.ts.',
  '7. Secrecy: sensitive schema nodes, secret inputs, inherited and nested secrets.',
  '   Covered in diff.secrets.test.ts.',
  '8. Options coverage: ignoreChanges (keys, indices, wildcards, presence changes).',
  '   Covered in diff.options.test.ts.',
  '9. Errors: shape mismatches, singleton overflow, set hash failures.',
  '   Covered in diff.errors.test.ts.'
] as const;
