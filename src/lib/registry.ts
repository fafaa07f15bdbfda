/**
 * Context registry
 *
 * The fixed set of contexts for a project, their watch directories and the
 * handoff rules between them. Loaded once per process from
 * `.switchyard/registry.json` (or the bundled default) and passed explicitly
 * to every component; the returned value is frozen.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { getStatePaths, getProjectRoot } from './config.js';
import type { PortMode } from './config.js';
import { ConfigError, UnknownContextError } from './errors.js';

// ============================================================================
// Constants
// ============================================================================

/** Recipient meaning "every context". */
export const BROADCAST = 'all';

/** Rule target meaning "every other context". */
export const WILDCARD = '*';

const RESERVED_IDS = new Set([BROADCAST, WILDCARD]);

export const DEFAULT_REGISTRY_PATH = fileURLToPath(
  new URL('../../templates/registry.default.json', import.meta.url)
);

// ============================================================================
// Schema
// ============================================================================

const ContextSchema = z.object({
  id: z.string().regex(/^[a-z][a-z0-9_-]*$/, 'must be lowercase letters, digits, "-" or "_"'),
  name: z.string().optional(),
  file: z.string().min(1),
  prefix: z.string().min(1),
  description: z.string().optional(),
  resume_prompt: z.string().optional(),
  is_coordinator: z.boolean().default(false),
  watch: z.array(z.string().min(1)).default([]),
});

const RuleSchema = z.object({
  to: z.array(z.string().min(1)).min(1),
  types: z.array(z.string().min(1)),
});

const PortMapSchema = z.record(z.number().int().positive());

export const RegistryFileSchema = z.object({
  context_path: z.string().default('docs/context/'),
  contexts: z.array(ContextSchema).min(1),
  handoff_rules: z.record(z.union([RuleSchema, z.array(RuleSchema)])).default({}),
  ports: z
    .object({
      normal: PortMapSchema.default({}),
      fallback: PortMapSchema.default({}),
    })
    .default({}),
});

export type RegistryFile = z.input<typeof RegistryFileSchema>;

// ============================================================================
// Types
// ============================================================================

export interface ContextDefinition {
  readonly id: string;
  readonly name: string;
  readonly file: string;
  readonly prefix: string;
  readonly description?: string;
  readonly resumePrompt?: string;
  readonly isCoordinator: boolean;
  /** Watch directories, relative to the project root. */
  readonly watch: readonly string[];
}

/** One expanded rule: `from` may send `types` to `to`. */
export interface HandoffRule {
  readonly from: string;
  readonly to: string;
  readonly types: readonly string[];
}

export interface ContextRegistry {
  readonly root: string;
  /** Directory of context files, relative to the root, with trailing slash. */
  readonly contextPath: string;
  /** Where the registry was loaded from (file path or "inline"). */
  readonly source: string;
  ids(): readonly string[];
  has(id: string): boolean;
  get(id: string): ContextDefinition | null;
  /** Like get(), but throws UnknownContextError. */
  assertKnown(id: string): ContextDefinition;
  coordinator(): string | null;
  isCoordinator(id: string): boolean;
  /** Types `from` may send to `to` by explicit rule (coordinator exemption not applied). */
  allowedTypes(from: string, to: string): readonly string[];
  rules(): readonly HandoffRule[];
  /** Absolute watch directories per context. */
  watchDirs(): ReadonlyMap<string, readonly string[]>;
  contextFilePath(id: string): string;
  ports(mode: PortMode): Readonly<Record<string, number>>;
}

// ============================================================================
// Construction
// ============================================================================

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate raw registry data and build a registry. Throws ConfigError.
 */
export function createRegistry(raw: unknown, root: string, source: string = 'inline'): ContextRegistry {
  const parsed = RegistryFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid context registry (${source}): ${describeIssues(parsed.error)}`, {
      source,
    });
  }
  const data = parsed.data;

  const definitions = new Map<string, ContextDefinition>();
  for (const ctx of data.contexts) {
    if (RESERVED_IDS.has(ctx.id)) {
      throw new ConfigError(`Context id "${ctx.id}" is reserved`, { source });
    }
    if (definitions.has(ctx.id)) {
      throw new ConfigError(`Duplicate context id "${ctx.id}"`, { source });
    }
    definitions.set(
      ctx.id,
      Object.freeze({
        id: ctx.id,
        name: ctx.name ?? ctx.id,
        file: ctx.file,
        prefix: ctx.prefix,
        description: ctx.description,
        resumePrompt: ctx.resume_prompt,
        isCoordinator: ctx.is_coordinator,
        watch: Object.freeze([...ctx.watch]),
      })
    );
  }

  const ids = Object.freeze([...definitions.keys()]);
  const coordinators = ids.filter((id) => definitions.get(id)?.isCoordinator);
  if (coordinators.length > 1) {
    throw new ConfigError(`Only one coordinator context allowed, found: ${coordinators.join(', ')}`, {
      source,
    });
  }
  const coordinatorId = coordinators[0] ?? null;

  // from -> to -> allowed types
  const table = new Map<string, Map<string, Set<string>>>();
  for (const [from, entry] of Object.entries(data.handoff_rules)) {
    if (!definitions.has(from)) {
      throw new ConfigError(`Handoff rule for unknown context "${from}"`, { source });
    }
    const targets = table.get(from) ?? new Map<string, Set<string>>();
    table.set(from, targets);

    for (const rule of Array.isArray(entry) ? entry : [entry]) {
      for (const target of rule.to) {
        let expanded: string[];
        if (target === WILDCARD) {
          expanded = ids.filter((id) => id !== from);
        } else if (definitions.has(target)) {
          expanded = [target];
        } else {
          throw new ConfigError(`Handoff rule ${from} -> "${target}" names an unknown context`, { source });
        }
        for (const to of expanded) {
          const types = targets.get(to) ?? new Set<string>();
          for (const type of rule.types) types.add(type);
          targets.set(to, types);
        }
      }
    }
  }

  const flatRules: HandoffRule[] = [];
  for (const from of ids) {
    const targets = table.get(from);
    if (!targets) continue;
    for (const to of ids) {
      const types = targets.get(to);
      if (types && types.size > 0) {
        flatRules.push(Object.freeze({ from, to, types: Object.freeze([...types]) }));
      }
    }
  }
  Object.freeze(flatRules);

  const watchDirs = new Map<string, readonly string[]>();
  for (const def of definitions.values()) {
    watchDirs.set(def.id, Object.freeze(def.watch.map((dir) => path.resolve(root, dir))));
  }

  const contextPath = data.context_path === '' || data.context_path.endsWith('/')
    ? data.context_path
    : `${data.context_path}/`;

  const ports = {
    normal: Object.freeze({ ...data.ports.normal }),
    fallback: Object.freeze({ ...data.ports.fallback }),
  };

  const registry: ContextRegistry = {
    root,
    contextPath,
    source,

    ids() {
      return ids;
    },

    has(id: string): boolean {
      return definitions.has(id);
    },

    get(id: string): ContextDefinition | null {
      return definitions.get(id) ?? null;
    },

    assertKnown(id: string): ContextDefinition {
      const def = definitions.get(id);
      if (!def) throw new UnknownContextError(id, ids);
      return def;
    },

    coordinator(): string | null {
      return coordinatorId;
    },

    isCoordinator(id: string): boolean {
      return coordinatorId !== null && id === coordinatorId;
    },

    allowedTypes(from: string, to: string): readonly string[] {
      const types = table.get(from)?.get(to);
      return types ? [...types] : [];
    },

    rules() {
      return flatRules;
    },

    watchDirs() {
      return watchDirs;
    },

    contextFilePath(id: string): string {
      const def = registry.assertKnown(id);
      return path.resolve(root, contextPath, def.file);
    },

    ports(mode: PortMode) {
      return ports[mode];
    },
  };

  return Object.freeze(registry);
}

/**
 * Load the project registry, falling back to the bundled default when the
 * project has none. A registry file that exists but is broken is fatal.
 */
export function loadRegistry(root: string = getProjectRoot()): ContextRegistry {
  const projectFile = getStatePaths(root).registryFile;
  const source = fs.existsSync(projectFile) ? projectFile : DEFAULT_REGISTRY_PATH;

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(source, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Could not read context registry ${source}: ${err instanceof Error ? err.message : String(err)}`,
      { source }
    );
  }

  return createRegistry(raw, root, source);
}
