import { FlowStepError } from './errors';
import { FlowContext, FlowDefinition } from './types';

export interface RunOptions {
  dryRun?: boolean;
}

export interface RunResult {
  data: Record<string, unknown>;
  stepsCompleted: number;
}

export async function runFlow(
  flow: FlowDefinition,
  ctx: FlowContext,
  options: RunOptions = {}
): Promise<RunResult> {
  const { dryRun = false } = options;
  let stepsCompleted = 0;

  ctx.logger.info({ flow: flow.name, dryRun }, 'Starting flow');

  for (const step of flow.steps) {
    if (dryRun) {
      ctx.logger.info({ flow: flow.name, step: step.name }, 'Dry run step');
      if (step.description) {
        ctx.logger.info(
          { flow: flow.name, step: step.name },
          step.description
        );
      }
      stepsCompleted += 1;
      continue;
    }

    if (!ctx.page) {
      throw new Error('FlowContext.page is required for non-dry-run execution.');
    }

    ctx.logger.info({ flow: flow.name, step: step.name }, 'Running step');
    try {
      await step.action(ctx);
    } catch (error) {
      throw new FlowStepError(flow.name, step.name, error);
    }
    stepsCompleted += 1;
  }

  ctx.logger.info({ flow: flow.name, dryRun, stepsCompleted }, 'Flow complete');
  return { data: { ...ctx.flowData }, stepsCompleted };
}
