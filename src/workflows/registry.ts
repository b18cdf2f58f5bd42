import { existsSync, readdirSync, statSync } from 'node:fs';
import { join } from 'node:path';
import type { Manifest } from '../manifest/types.js';
import { ManifestError } from '../manifest/errors.js';
import { loadManifest } from '../manifest/loader.js';
import type { Template } from '../template/types.js';
import { TemplateError, loadTemplate } from '../template/loader.js';
import { findPathConflict } from '../patch/path.js';

export const MANIFEST_FILE = 'manifest.json';

export class WorkflowNotFoundError extends Error {
  constructor(public readonly workflowId: string) {
    super(`Workflow not found: ${workflowId}`);
    this.name = 'WorkflowNotFoundError';
  }
}

export interface WorkflowSummary {
  id: string;
  name: string;
  description: string;
  version: string;
}

/**
 * A loaded (manifest, template) pair. The template is deep-frozen and shared
 * by every caller; patching works on a copy.
 */
export interface Workflow {
  id: string;
  dir: string;
  manifest: Manifest;
  template: Template;
}

export type DiagnosticCode =
  | 'missing_root'
  | 'missing_manifest'
  | 'missing_template'
  | 'invalid_manifest'
  | 'invalid_template'
  | 'id_mismatch'
  | 'unknown_node'
  | 'field_conflict'
  | 'unknown_preset_param';

export interface RegistryDiagnostic {
  /** `error` excludes the workflow; `warning` leaves it loaded. */
  level: 'error' | 'warning';
  code: DiagnosticCode;
  workflowId: string;
  message: string;
}

export interface RegistryOptions {
  root: string;
  manifestFile?: string;
  onDiagnostic?: (diagnostic: RegistryDiagnostic) => void;
}

export interface ReloadResult {
  count: number;
  failed: Array<{ id: string; message: string }>;
}

interface Snapshot {
  workflows: ReadonlyMap<string, Workflow>;
  diagnostics: readonly RegistryDiagnostic[];
  loadedAt: string;
}

/**
 * Discovers workflow directories under `root` and serves them from an
 * in-memory snapshot. `reload()` builds a complete replacement snapshot
 * and swaps it in with a single assignment; the live snapshot is never
 * modified, so readers always see one consistent generation.
 */
export class WorkflowRegistry {
  private readonly root: string;
  private readonly manifestFile: string;
  private readonly onDiagnostic?: (diagnostic: RegistryDiagnostic) => void;
  private snapshot: Snapshot | null = null;

  constructor(options: RegistryOptions) {
    this.root = options.root;
    this.manifestFile = options.manifestFile ?? MANIFEST_FILE;
    this.onDiagnostic = options.onDiagnostic;
  }

  listWorkflows(): WorkflowSummary[] {
    return Array.from(this.current().workflows.values(), ({ manifest }) => ({
      id: manifest.id,
      name: manifest.name,
      description: manifest.description,
      version: manifest.version,
    }));
  }

  getWorkflow(workflowId: string): Workflow {
    const workflow = this.current().workflows.get(workflowId);
    if (!workflow) {
      throw new WorkflowNotFoundError(workflowId);
    }
    return workflow;
  }

  hasWorkflow(workflowId: string): boolean {
    return this.current().workflows.has(workflowId);
  }

  diagnostics(): RegistryDiagnostic[] {
    return [...this.current().diagnostics];
  }

  /** Workflows that failed to load in the current generation, and why. */
  failures(): ReloadResult['failed'] {
    return failuresOf(this.current());
  }

  get loadedAt(): string | null {
    return this.snapshot?.loadedAt ?? null;
  }

  reload(): ReloadResult {
    const next = this.swap();
    return { count: next.workflows.size, failed: failuresOf(next) };
  }

  private current(): Snapshot {
    return this.snapshot ?? this.swap();
  }

  private swap(): Snapshot {
    const next = this.scan();
    this.snapshot = next;
    for (const diagnostic of next.diagnostics) {
      this.onDiagnostic?.(diagnostic);
    }
    return next;
  }

  private scan(): Snapshot {
    const workflows = new Map<string, Workflow>();
    const diagnostics: RegistryDiagnostic[] = [];
    const loadedAt = new Date().toISOString();

    if (!existsSync(this.root) || !statSync(this.root).isDirectory()) {
      diagnostics.push({
        level: 'warning',
        code: 'missing_root',
        workflowId: '',
        message: `Workflows directory not found: ${this.root}`,
      });
      return { workflows, diagnostics, loadedAt };
    }

    const entries = readdirSync(this.root, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();

    for (const dirName of entries) {
      const workflow = this.loadOne(dirName, diagnostics);
      if (workflow) workflows.set(workflow.id, workflow);
    }

    return { workflows, diagnostics, loadedAt };
  }

  private loadOne(dirName: string, diagnostics: RegistryDiagnostic[]): Workflow | undefined {
    const dir = join(this.root, dirName);
    const report = (level: RegistryDiagnostic['level'], code: DiagnosticCode, message: string): void => {
      diagnostics.push({ level, code, workflowId: dirName, message });
    };

    const manifestPath = join(dir, this.manifestFile);
    if (!existsSync(manifestPath)) {
      report('warning', 'missing_manifest', `Skipped "${dirName}": no ${this.manifestFile}`);
      return undefined;
    }

    let manifest: Manifest;
    try {
      manifest = loadManifest(manifestPath);
    } catch (err) {
      report('error', 'invalid_manifest', describeLoadError(err, ManifestError));
      return undefined;
    }

    if (manifest.id !== dirName) {
      report('error', 'id_mismatch', `Manifest id "${manifest.id}" does not match directory name "${dirName}"`);
      return undefined;
    }

    const templatePath = join(dir, manifest.templateFile);
    if (!existsSync(templatePath)) {
      report('warning', 'missing_template', `Skipped "${dirName}": template file ${manifest.templateFile} not found`);
      return undefined;
    }

    let template: Template;
    try {
      template = loadTemplate(templatePath);
    } catch (err) {
      report('error', 'invalid_template', describeLoadError(err, TemplateError));
      return undefined;
    }

    // Mismatches between manifest and template only warn; the workflow stays loaded.
    for (const spec of manifest.params.values()) {
      const { nodeId, field, path } = spec.patch;
      const node = Object.hasOwn(template, nodeId) ? template[nodeId] : undefined;
      if (node === undefined) {
        report('warning', 'unknown_node', `Parameter "${spec.name}" patches node "${nodeId}", which is not in the template`);
        continue;
      }
      const conflict = findPathConflict(node, path);
      if (conflict !== undefined) {
        report(
          'warning',
          'field_conflict',
          `Parameter "${spec.name}" field "${field}" crosses "${conflict}" in node "${nodeId}", which is not an object`,
        );
      }
    }

    for (const [presetName, values] of manifest.presets) {
      for (const key of Object.keys(values)) {
        if (!manifest.params.has(key)) {
          report('warning', 'unknown_preset_param', `Preset "${presetName}" sets undeclared parameter "${key}"`);
        }
      }
    }

    return { id: manifest.id, dir, manifest, template };
  }
}

function failuresOf(snapshot: Snapshot): ReloadResult['failed'] {
  return snapshot.diagnostics
    .filter((d) => d.level === 'error')
    .map((d) => ({ id: d.workflowId, message: d.message }));
}

/** Expected validation errors keep their message; I/O failures are labelled as such. */
function describeLoadError(err: unknown, expected: typeof ManifestError | typeof TemplateError): string {
  if (err instanceof expected) return err.message;
  const reason = err instanceof Error ? err.message : String(err);
  return `Failed to read workflow files: ${reason}`;
}
