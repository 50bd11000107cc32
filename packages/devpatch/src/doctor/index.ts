export { runDoctor } from './runner.js'
export { checkSsh, checkScp } from './checks.js'
