// Pipeline validator: structural checks via zod, then cross-reference checks

import { Pipeline } from '../../models/pipeline.js';
import { PipelineSchema } from '../../core/schemas.js';

/**
 * A single validation problem, located by a dotted path into the pipeline
 */
export interface PipelineIssue {
  field: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: PipelineIssue[];
}

interface Named {
  name: string;
  dependsOn?: string[];
}

/**
 * Checks names are unique and every dependsOn points at a sibling
 */
function validateSiblings(kind: 'Stage' | 'Job', items: Named[], basePath: string): PipelineIssue[] {
  const errors: PipelineIssue[] = [];
  const seen = new Set<string>();

  items.forEach((item, index) => {
    if (seen.has(item.name)) {
      errors.push({ field: `${basePath}.${index}.name`, message: `Duplicate ${kind.toLowerCase()} name "${item.name}"` });
    }
    seen.add(item.name);
  });

  items.forEach((item, index) => {
    for (const dependency of item.dependsOn ?? []) {
      if (dependency === item.name) {
        errors.push({ field: `${basePath}.${index}.dependsOn`, message: `${kind} "${item.name}" cannot depend on itself` });
      } else if (!seen.has(dependency)) {
        errors.push({ field: `${basePath}.${index}.dependsOn`, message: `${kind} "${item.name}" depends on unknown ${kind.toLowerCase()} "${dependency}"` });
      }
    }
  });

  const cycle = findCycle(items);
  if (cycle) {
    errors.push({ field: basePath, message: `${kind} dependency cycle: ${cycle.join(' -> ')}` });
  }

  return errors;
}

/**
 * Depth-first search over dependsOn edges. Self-edges are reported separately.
 */
export function findCycle(items: Named[]): string[] | null {
  const edges = new Map<string, string[]>();
  for (const item of items) {
    edges.set(item.name, (item.dependsOn ?? []).filter(d => d !== item.name));
  }

  const visiting: string[] = [];
  const done = new Set<string>();

  const visit = (name: string): string[] | null => {
    const open = visiting.indexOf(name);
    if (open !== -1) {
      return [...visiting.slice(open), name];
    }
    if (done.has(name) || !edges.has(name)) {
      return null;
    }

    visiting.push(name);
    for (const next of edges.get(name) ?? []) {
      const cycle = visit(next);
      if (cycle) return cycle;
    }
    visiting.pop();
    done.add(name);
    return null;
  };

  for (const item of items) {
    const cycle = visit(item.name);
    if (cycle) return cycle;
  }

  return null;
}

/**
 * PipelineValidator checks a pipeline object graph before it is rendered
 */
export class PipelineValidator {
  validate(pipeline: Pipeline): ValidationResult {
    const parsed = PipelineSchema.safeParse(pipeline);
    if (!parsed.success) {
      return {
        valid: false,
        errors: parsed.error.issues.map(issue => ({
          field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
          message: issue.message
        }))
      };
    }

    const errors: PipelineIssue[] = [...validateSiblings('Stage', pipeline.stages, 'stages')];

    pipeline.stages.forEach((stage, index) => {
      errors.push(...validateSiblings('Job', stage.jobs, `stages.${index}.jobs`));
    });

    return {
      valid: errors.length === 0,
      errors
    };
  }
}
