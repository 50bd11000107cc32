import { sessionCommand } from './session.js'

export function patchCommand(args: string[]): Promise<number> {
  return sessionCommand('patch', args)
}
