import pc from 'picocolors';
import type { SyncRunRow } from '../services/sync/history.js';
import type { RunResult } from '../services/sync/types.js';

export type Palette = ReturnType<typeof pc.createColors>;

const MAX_LISTED_ERRORS = 10;

export function formatRunResult(result: RunResult, colors: Palette = pc): string[] {
  const lines: string[] = [];
  const status = result.state === 'done' ? colors.green('done') : colors.red('failed');
  lines.push(`${colors.bold('Sync')} ${status} ${colors.dim(`(${result.runId})`)}`);

  if (result.sync) {
    const { created, updated, removed, errors } = result.sync;
    lines.push(`  created ${created}, updated ${updated}, removed ${removed}, skipped ${errors.length}`);
    for (const item of errors.slice(0, MAX_LISTED_ERRORS)) {
      lines.push(colors.yellow(`  ! ${item.kind} ${item.ref}: ${item.error}`));
    }
    if (errors.length > MAX_LISTED_ERRORS) {
      lines.push(colors.dim(`  … ${errors.length - MAX_LISTED_ERRORS} more`));
    }
  }

  if (result.mirror) {
    const { added, alreadyPresent, remotePlaylistId, createdRemote } = result.mirror;
    const origin = createdRemote ? ' (new remote playlist)' : '';
    lines.push(`  mirror ${remotePlaylistId}${origin}: added ${added}, already present ${alreadyPresent}`);
  }
  if (result.mirrorError) {
    lines.push(colors.red(`  mirror failed: ${result.mirrorError}`));
  }
  if (result.error) {
    lines.push(colors.red(`  error: ${result.error}`));
  }
  return lines;
}

export function formatRunHistory(runs: SyncRunRow[], colors: Palette = pc): string[] {
  if (runs.length === 0) {
    return [colors.dim('No sync runs recorded')];
  }
  return runs.map((run) => {
    const status =
      run.status === 'done' ? colors.green(run.status) : run.status === 'failed' ? colors.red(run.status) : colors.cyan(run.status);
    const totals = `+${run.created} ~${run.updated} -${run.removed}`;
    const mirror = run.mirror_added === null ? '' : ` mirror +${run.mirror_added}`;
    const failure = run.error_message ? colors.dim(` ${run.error_message}`) : '';
    return `${run.started_at} ${status} ${totals} errors ${run.error_count}${mirror}${failure}`;
  });
}
