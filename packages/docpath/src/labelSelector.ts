import { z } from "zod"
import { LabelSelectorError } from "./error"
import type { JSONRecord } from "./json"

const labelSelectorOperatorSchema = z.enum(["In", "NotIn", "Exists", "DoesNotExist"])

export type LabelSelectorOperator = z.infer<typeof labelSelectorOperatorSchema>

const matchLabelsSchema = z.record(z.string())

const labelSelectorRequirementSchema = z.object({
  key: z.string(),
  operator: labelSelectorOperatorSchema,
  values: z.array(z.string()).default([]),
})

export type LabelSelectorRequirement = z.infer<typeof labelSelectorRequirementSchema>

const labelSelectorSchema = z.object({
  matchLabels: matchLabelsSchema.default({}),
  matchExpressions: z.array(labelSelectorRequirementSchema).default([]),
})

export type LabelSelector = z.infer<typeof labelSelectorSchema>

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, name: string): T {
  const result = schema.safeParse(value)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = [name, ...issue.path].join(".")
    throw new LabelSelectorError(`failed to parse ${where}: ${issue.message}`)
  }
  return result.data
}

/**
 * Parses a label selector from a document section, e.g.
 *
 * ```yaml
 * matchLabels:
 *   app.kubernetes.io/name: test
 * matchExpressions:
 *   - key: app.kubernetes.io/instance
 *     operator: In
 *     values: [test]
 * ```
 *
 * If neither matchLabels nor matchExpressions is present, the section is a
 * service-style selector: a plain map of labels.
 *
 * @throws LabelSelectorError naming the first entry of the wrong type.
 */
export function parseLabelSelector(section: JSONRecord): LabelSelector {
  if (!Object.hasOwn(section, "matchLabels") && !Object.hasOwn(section, "matchExpressions")) {
    return {
      matchLabels: parse(matchLabelsSchema, section, "selector"),
      matchExpressions: [],
    }
  }
  return parse(labelSelectorSchema, section, "selector")
}
