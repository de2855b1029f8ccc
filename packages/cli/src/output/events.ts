import { BuildEventType, type BuildEvent } from '@kiln/kernel'
import { t } from './theme.js'

/** Width of the verb column, so rule names line up. */
const VERB_WIDTH = 11

function line(verb: string, color: (s: string) => string, rest: string): string {
  return '  ' + color(verb.padEnd(VERB_WIDTH)) + rest
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error)
}

const STAGE: Partial<Record<BuildEventType, string>> = {
  [BuildEventType.PreProcessError]:  'preprocess',
  [BuildEventType.ExecError]:        'action',
  [BuildEventType.PostProcessError]: 'postprocess',
  [BuildEventType.FatalError]:       'fatal',
}

/**
 * renderEvent: one console line per build event, or null for events the
 * console does not show (Skip of rules pulled in as dependencies).
 */
export function renderEvent(event: BuildEvent): string | null {
  switch (event.type) {
    case BuildEventType.Skip:
      return event.directTarget ? line('up to date', t.muted, t.muted(event.rule.name)) : null
    case BuildEventType.Start:
      return line('make', t.blue, t.white(event.rule.name))
    case BuildEventType.Done:
      return line('done', t.green, t.white(event.rule.name))
    case BuildEventType.DryRun:
      return line('would make', t.amber, t.white(event.rule.name))
    case BuildEventType.UpdateInfeasible:
      return line('infeasible', t.red, t.white(event.rule.name) + '  ' + t.text(event.reason))
    case BuildEventType.PreProcessError:
    case BuildEventType.ExecError:
    case BuildEventType.PostProcessError:
    case BuildEventType.FatalError:
      return line(
        'failed',
        t.red,
        t.white(event.rule.name) + '  ' + t.dim(`(${STAGE[event.type] ?? ''})`) + ' ' + t.text(errorMessage(event.error)),
      )
    case BuildEventType.StopOnFail:
      return '  ' + t.amber('stopped after a failure; pass --keep-going to build independent rules')
  }
}
