import fs from 'fs';
import path from 'path';
import { AppConfig } from './types';

export const TOOL_NAME = 'court-watch';
export const TOOL_VERSION = '0.1.0';

export interface OutputMeta {
  tool: string;
  version: string;
  flow: string;
  overviewUrl: string;
  timestamp: string;
  durationMs: number;
  stepsCompleted: number;
  stepsTotal: number;
  success: boolean;
}

export interface OutputEnvelope {
  meta: OutputMeta;
  data: Record<string, unknown>;
  errors: string[];
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function formatTime(date: Date): string {
  return date.toISOString().slice(11, 19).replace(/:/g, '');
}

export function outputPathFor(config: AppConfig, flowName: string, now: Date): string {
  const flowDir = path.join(config.outputDir, flowName, formatDate(now));
  return path.join(flowDir, `${flowName}-${formatTime(now)}.json`);
}

export function writeOutput(
  config: AppConfig,
  flowName: string,
  envelope: OutputEnvelope,
  now = new Date()
): string {
  const outputPath = outputPathFor(config, flowName, now);
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, JSON.stringify(envelope, null, 2), 'utf-8');

  return outputPath;
}
