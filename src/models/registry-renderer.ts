import path from "node:path"
import { mkdir, rename, writeFile } from "node:fs/promises"

import type { ModelBackendType, ModelDefinition, ModelRegistry } from "../config/steward-config.js"

export type RenderedModel = {
  type: ModelBackendType
  modelName: string
  endpoint?: string
  maxTokens?: number
  temperature?: number
  isDefault?: boolean
  extraConfig?: Record<string, string>
}

export type ModelsDocument = {
  models: Record<string, RenderedModel>
  defaultModel: string | null
}

/**
 * Orders keys by UTF-16 code units. The comparison is locale independent, so the default
 * model picked on one host is the default on every host.
 */
export const compareModelKeys = (left: string, right: string): number => {
  if (left < right) {
    return -1
  }

  return left > right ? 1 : 0
}

export const sortedModelKeys = (registry: ModelRegistry): string[] => {
  return Object.keys(registry.models).sort(compareModelKeys)
}

/**
 * Picks the effective default model:
 * 1. the explicit default key,
 * 2. the first flagged `isDefault` key in sorted order,
 * 3. the first key in sorted order,
 * 4. `null` for an empty registry.
 */
export const resolveDefaultModel = (registry: ModelRegistry): string | null => {
  if (registry.defaultModelKey !== null) {
    return registry.defaultModelKey
  }

  const keys = sortedModelKeys(registry)
  const flagged = keys.find((key) => registry.models[key]?.isDefault === true)

  return flagged ?? keys[0] ?? null
}

const renderModel = (model: ModelDefinition): RenderedModel => {
  const rendered: RenderedModel = {
    type: model.backendType,
    modelName: model.modelName,
  }

  // An empty endpoint means the provider default.
  if (model.endpoint) {
    rendered.endpoint = model.endpoint
  }

  if (model.maxTokens !== null && model.maxTokens !== undefined) {
    rendered.maxTokens = model.maxTokens
  }

  if (model.temperature !== null && model.temperature !== undefined) {
    rendered.temperature = model.temperature
  }

  rendered.isDefault = model.isDefault

  if (model.extraConfig !== null && model.extraConfig !== undefined) {
    rendered.extraConfig = { ...model.extraConfig }
  }

  return rendered
}

/**
 * Pure transformation of the registry into the document the gateway reads at start. Absent
 * fields are left out rather than written as null.
 *
 * @param registry Validated model registry.
 * @returns Sparse models document with keys in sorted order.
 */
export const renderModelsDocument = (registry: ModelRegistry): ModelsDocument => {
  const models: Record<string, RenderedModel> = {}

  for (const key of sortedModelKeys(registry)) {
    const model = registry.models[key]
    if (model) {
      models[key] = renderModel(model)
    }
  }

  return {
    models,
    defaultModel: resolveDefaultModel(registry),
  }
}

export const serializeModelsDocument = (document: ModelsDocument): string => {
  return `${JSON.stringify(document, null, 2)}\n`
}

/**
 * Writes the document through a sibling temporary file and a rename, so the gateway never
 * starts against a half-written file. The gateway must be restarted to pick it up.
 *
 * @param targetPath Models config path handed to the gateway.
 * @param document Rendered document.
 */
export const writeModelsDocument = async (
  targetPath: string,
  document: ModelsDocument
): Promise<void> => {
  await mkdir(path.dirname(targetPath), { recursive: true })

  const temporaryPath = `${targetPath}.${process.pid}.partial`
  await writeFile(temporaryPath, serializeModelsDocument(document), "utf8")
  await rename(temporaryPath, targetPath)
}
