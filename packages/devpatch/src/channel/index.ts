export { SshChannel } from './ssh-channel.js'
export type { RemoteChannel, ChannelFailure, ChannelOperation, RemoteExecResult } from './types.js'
