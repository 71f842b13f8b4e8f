import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { CONFIG_DIR, getProjectRoot } from './config.js';

const ToolLogEntrySchema = z.object({
  timestamp: z.string(),
  format: z.string(),
  action: z.enum(['parse', 'run', 'error']),
  source: z.string().optional(),
  command: z.string().optional(),
  exitCode: z.number().optional(),
  fileCount: z.number().optional(),
  violationCount: z.number().optional(),
  error: z.string().optional(),
});

export type ToolLogEntry = z.infer<typeof ToolLogEntrySchema>;

function getLogsDirectory(projectPath?: string): string | null {
  const root = projectPath || getProjectRoot();
  if (!root) {
    return null;
  }

  const logsDir = path.join(root, CONFIG_DIR, 'logs');
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  return logsDir;
}

function logFileName(format: string): string {
  return `${format.replace(/[^a-zA-Z0-9-_]/g, '_')}.log`;
}

function getToolLogPath(format: string, projectPath?: string): string | null {
  const logsDir = getLogsDirectory(projectPath);
  if (!logsDir) {
    return null;
  }
  return path.join(logsDir, logFileName(format));
}

/**
 * Appends an entry to `.lintlens/logs/<format>.log`. Outside a project this is a no-op.
 */
export async function logToolAction(entry: ToolLogEntry, projectPath?: string): Promise<void> {
  try {
    const logPath = getToolLogPath(entry.format, projectPath);
    if (!logPath) {
      return;
    }
    fs.appendFileSync(logPath, JSON.stringify(entry) + '\n', 'utf-8');
  } catch (error) {
    // The run itself succeeded; a missing log line is not worth failing it
    console.error(`Failed to write tool log:`, error);
  }
}

export async function getToolLogs(format: string, limit: number = 50, projectPath?: string): Promise<ToolLogEntry[]> {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`Invalid log limit: ${limit} (expected a positive number of entries)`);
  }
  const root = projectPath || getProjectRoot();
  if (!root) {
    return [];
  }
  const logPath = path.join(root, CONFIG_DIR, 'logs', logFileName(format));
  if (!fs.existsSync(logPath)) {
    return [];
  }

  const content = fs.readFileSync(logPath, 'utf-8');
  return content
    .split('\n')
    .filter((line) => line.trim())
    .flatMap((line) => {
      try {
        const entry = ToolLogEntrySchema.safeParse(JSON.parse(line));
        return entry.success ? [entry.data] : [];
      } catch {
        // Partially written line
        return [];
      }
    })
    .slice(-limit);
}
