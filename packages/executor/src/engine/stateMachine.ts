import { ExecutionState } from '@permit-relay/dto'

const S = ExecutionState

export class StateMachine {
  private ALLOWED: Record<ExecutionState, ExecutionState[]> = {
    [S.VALIDATING]:     [S.LIMIT_CHECKING, S.REJECTED],
    [S.LIMIT_CHECKING]: [S.TRANSFERRING, S.REJECTED],
    [S.TRANSFERRING]:   [S.FORWARDING, S.ROLLED_BACK, S.FAILED],
    [S.FORWARDING]:     [S.COMMITTING, S.ROLLED_BACK, S.FAILED],
    [S.COMMITTING]:     [S.COMPLETED, S.FAILED],
    [S.COMPLETED]:      [],
    [S.REJECTED]:       [],
    [S.ROLLED_BACK]:    [],
    [S.FAILED]:         []
  }

  can(from: ExecutionState, to: ExecutionState): boolean {
    return this.ALLOWED[from].includes(to)
  }

  isTerminal(state: ExecutionState): boolean {
    return this.ALLOWED[state].length === 0
  }
}
