import { RegistrationInvalidError } from '../domain/index.js';
import type { FunctionMetadata, FunctionPatch, TriggerType } from '../domain/index.js';
import type { Registry } from './registry.js';
import { validateTrigger } from './function-schema.js';
import type { PatchFunctionBody, RegisterFunctionBody } from './function-schema.js';

export type FunctionSummary = Omit<FunctionMetadata, 'code'>;

export interface ListFunctionsParams {
  trigger_type?: TriggerType | undefined;
  page_token?: string | undefined;
  page_size?: number | undefined;
}

export interface FunctionListResult {
  data: FunctionSummary[];
  next_page_token: string | null;
}

export function toSummary(metadata: FunctionMetadata): FunctionSummary {
  const { code: _code, ...summary } = metadata;
  return summary;
}

/** Register a new function at version 1. Throws RegistrationInvalidError for unusable triggers. */
export async function createFunction(registry: Registry, input: RegisterFunctionBody): Promise<FunctionMetadata> {
  const issues = validateTrigger(input.trigger);
  if (issues.length > 0) throw new RegistrationInvalidError(issues);

  return registry.registerFunction({
    name: input.name,
    description: input.description,
    trigger: input.trigger,
    permissions: input.permissions,
    resources: input.resources,
    code: input.code,
  });
}

/** One page of functions ordered by id, without code bodies. */
export async function listFunctions(registry: Registry, params: ListFunctionsParams): Promise<FunctionListResult> {
  const page = await registry.listFunctions(
    { trigger_type: params.trigger_type },
    params.page_token,
    params.page_size,
  );
  return {
    data: page.functions.map(toSummary),
    next_page_token: page.next_page_token ?? null,
  };
}

/** Fetch a single function by ID. Returns null if not found. */
export async function getFunction(registry: Registry, id: string): Promise<FunctionMetadata | null> {
  return (await registry.getFunction(id)) ?? null;
}

/**
 * Partial update producing a new version.
 * Throws FunctionNotFoundError, VersionConflictError or RegistrationInvalidError.
 */
export async function patchFunction(registry: Registry, id: string, input: PatchFunctionBody): Promise<FunctionMetadata> {
  if (input.trigger !== undefined) {
    const issues = validateTrigger(input.trigger);
    if (issues.length > 0) throw new RegistrationInvalidError(issues);
  }

  const patch: FunctionPatch = {
    name: input.name,
    description: input.description,
    trigger: input.trigger,
    permissions: input.permissions,
    resources: input.resources,
    code: input.code,
  };
  return registry.updateFunction(id, patch, input.expected_version);
}

/** Delete a function. Returns true if deleted, false if not found. */
export async function removeFunction(registry: Registry, id: string): Promise<boolean> {
  return registry.deleteFunction(id);
}
