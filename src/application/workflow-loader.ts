import { readFileSync, readdirSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import type { Logger } from 'pino';
import type { ActionSpec, WorkflowDefinition } from '../domain/index.js';
import { errorMessage } from '../domain/index.js';
import { parseWorkflowDefinition } from './workflow-schema.js';
import { findPlaceholders } from './template-resolver.js';
import { parseCondition } from './condition-evaluator.js';

export interface LoadFailure {
  readonly file: string;
  readonly error: string;
}

export interface LoadResult {
  readonly definitions: WorkflowDefinition[];
  readonly failures: LoadFailure[];
}

/**
 * Problems that will only surface when the workflow runs: a condition
 * that does not parse or a malformed placeholder. Such documents are
 * still accepted; at run time these become captured failures.
 */
export function lintWorkflow(definition: WorkflowDefinition): string[] {
  const warnings: string[] = [];

  if (definition.trigger.condition !== undefined && definition.trigger.condition.trim() !== '') {
    try {
      parseCondition(definition.trigger.condition);
    } catch (err: unknown) {
      warnings.push(`trigger.condition: ${errorMessage(err)}`);
    }
  }

  const lintChain = (chain: readonly ActionSpec[], prefix: string): void => {
    chain.forEach((action, index) => {
      const fields = {
        target: action.target ?? '',
        template: action.template ?? '',
        channel: action.channel ?? '',
        data: action.data,
      };
      try {
        findPlaceholders(fields);
      } catch (err: unknown) {
        warnings.push(`${prefix}.${index} (${action.id}): ${errorMessage(err)}`);
      }
    });
  };

  lintChain(definition.actions, 'actions');
  if (definition.error_handler !== undefined) {
    lintChain(definition.error_handler.actions, 'error_handler.actions');
  }

  return warnings;
}

/**
 * Loads every `*.json` workflow document in `dir`.
 *
 * Documents that fail to parse or validate are logged and reported in
 * `failures`; they are never returned as definitions. A missing
 * directory yields an empty result.
 */
export function loadWorkflowDirectory(dir: string, log: Logger): LoadResult {
  if (!existsSync(dir)) {
    log.warn({ dir }, 'Workflows directory not found');
    return { definitions: [], failures: [] };
  }

  const definitions: WorkflowDefinition[] = [];
  const failures: LoadFailure[] = [];

  const files = readdirSync(dir).filter((f) => f.endsWith('.json')).sort();

  for (const file of files) {
    const path = join(dir, file);
    try {
      const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
      const definition = parseWorkflowDefinition(raw);

      for (const warning of lintWorkflow(definition)) {
        log.warn({ workflow_id: definition.id, file, warning }, 'Workflow document has a runtime problem');
      }

      definitions.push(definition);
      log.debug({ workflow_id: definition.id, file }, 'Workflow document loaded');
    } catch (err: unknown) {
      failures.push({ file, error: errorMessage(err) });
      log.error({ err, file }, 'Failed to load workflow document');
    }
  }

  log.info(
    { dir, loaded: definitions.length, failed: failures.length },
    'Workflow documents loaded',
  );

  return { definitions, failures };
}
