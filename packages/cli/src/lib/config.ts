import fs from 'node:fs'
import { z } from 'zod'
import { isMaturity, MATURITY_LEVELS } from '@modforge/core'
import { invalidConfig } from '@modforge/shared/lib/errors'

export const PROJECT_CONFIG_FILE = 'modforge.config.json'
export const MODULE_CONFIG_FILE = 'module.json'

const featureSchema = z
  .object({
    key: z.string().min(1),
    content: z.string(),
    id: z.string().min(1).optional(),
  })
  .strict()

const maturitySchema = z
  .string()
  .refine((value) => !value.trim() || isMaturity(value.trim().toUpperCase()), {
    message: `Expected one of: ${MATURITY_LEVELS.map((level) => level.toLowerCase()).join(', ')}`,
  })

const readmeShape = {
  description: z.string().optional(),
  maturity: maturitySchema.optional(),
  /** `null` disables README generation for the module */
  template: z.string().min(1).nullable().optional(),
  inputs: z.array(z.string().min(1)).default([]),
  properties: z.record(z.string()).default({}),
  features: z.array(featureSchema).default([]),
  unknownPlaceholders: z.enum(['ignore', 'warn']).default('ignore'),
}

export const readmeConfigSchema = z.object(readmeShape).strict()

export const moduleConfigSchema = z
  .object({
    ...readmeShape,
    name: z.string().min(1).optional(),
  })
  .strict()

const repositoryNameSchema = z
  .string()
  .regex(/^[A-Za-z][A-Za-z0-9_-]*$/, 'Repository names start with a letter and use letters, digits, "-" or "_"')

export const publishingConfigSchema = z
  .object({
    vcs: z
      .object({
        url: z.string().url(),
        connection: z.string().min(1).optional(),
        developerConnection: z.string().min(1).optional(),
        prefix: z.string().optional(),
      })
      .strict()
      .optional(),
    github: z
      .object({
        project: z.string().min(1),
        org: z.string().min(1),
        addToRelease: z.boolean().optional(),
      })
      .strict()
      .optional(),
    repositories: z
      .array(
        z
          .object({
            name: repositoryNameSchema,
            url: z.string().url(),
            addToRelease: z.boolean().optional(),
          })
          .strict()
      )
      .default([]),
    sonatype: z
      .object({
        root: z.string().url().optional(),
      })
      .strict()
      .optional(),
  })
  .strict()

export const projectConfigSchema = z
  .object({
    name: z.string().min(1),
    group: z.string().min(1).optional(),
    version: z.string().min(1),
    /** Module paths relative to the project root, in aggregation order */
    modules: z.array(z.string().min(1)).optional(),
    readme: readmeConfigSchema.optional(),
    publishing: publishingConfigSchema.optional(),
    properties: z.record(z.string()).default({}),
  })
  .strict()

export type ReadmeConfig = z.infer<typeof readmeConfigSchema>
export type ModuleConfig = z.infer<typeof moduleConfigSchema>
export type PublishingConfig = z.infer<typeof publishingConfigSchema>
export type ProjectConfig = z.infer<typeof projectConfigSchema>

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

export function parseConfig<S extends z.ZodTypeAny>(file: string, schema: S, raw: unknown): z.infer<S> {
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    throw invalidConfig(file, formatIssues(parsed.error))
  }
  return parsed.data
}

/**
 * Reads and validates a JSON configuration file.
 */
export function readConfigFile<S extends z.ZodTypeAny>(file: string, schema: S): z.infer<S> {
  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw invalidConfig(file, message)
  }
  return parseConfig(file, schema, raw)
}
