import { sessionCommand } from './session.js'

export function undoCommand(args: string[]): Promise<number> {
  return sessionCommand('undo', args)
}
