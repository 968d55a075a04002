import type { JSONRecord } from "./json"
import { type Logger, silentLogger } from "./logger"
import { isRecord } from "./utils"

/**
 * Describes fields to remove from a document.
 *
 * - `fields`: keys removed from the current level.
 * - `nested`: sub-trees to recurse into. A nested cleaner without fields and
 *   without nested entries removes the sub-tree as a whole.
 */
export interface FieldCleaner {
  readonly fields?: readonly string[]
  readonly nested?: Readonly<Record<string, FieldCleaner>>
}

export interface CleanFieldsOptions {
  /**
   * Receives a warning for every nested entry that is present but not an
   * object, which is left untouched.
   */
  logger?: Logger
}

/**
 * Fields set by the cluster that should not be part of a desired state.
 */
export const MANAGED_FIELDS: FieldCleaner = {
  nested: {
    metadata: {
      fields: [
        "managedFields",
        "creationTimestamp",
        "generation",
        "resourceVersion",
        "uid",
        "finalizers",
      ],
      nested: {
        labels: {
          fields: ["app.kubernetes.io/managed-by"],
        },
        annotations: {
          fields: [
            "deployment.kubernetes.io/revision",
            "kubectl.kubernetes.io/last-applied-configuration",
          ],
        },
      },
    },
    status: {},
  },
}

function removesWholeTree(cleaner: FieldCleaner): boolean {
  return (cleaner.fields?.length ?? 0) === 0 && Object.keys(cleaner.nested ?? {}).length === 0
}

function clean(cleaner: FieldCleaner, record: JSONRecord, path: string, logger: Logger): void {
  for (const key of cleaner.fields ?? []) {
    delete record[key]
  }

  for (const [key, nested] of Object.entries(cleaner.nested ?? {})) {
    if (removesWholeTree(nested)) {
      delete record[key]
      continue
    }
    if (!Object.hasOwn(record, key)) continue

    const subTree = record[key]
    if (!isRecord(subTree)) {
      logger.warn(`field cleaner: ${path}${key} is not an object, skipping`)
      continue
    }
    clean(nested, subTree, `${path}${key}.`, logger)
  }
}

/**
 * Removes the fields described by `cleaner` from the document, in place.
 *
 * @returns The same document, for chaining.
 */
export function cleanFields(
  cleaner: FieldCleaner,
  document: JSONRecord,
  options: CleanFieldsOptions = {}
): JSONRecord {
  clean(cleaner, document, "", options.logger ?? silentLogger)
  return document
}
