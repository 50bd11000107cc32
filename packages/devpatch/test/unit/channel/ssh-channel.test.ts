import { describe, it, expect, vi, beforeEach } from 'vitest'
import * as fs from 'node:fs/promises'
import { SshChannel } from '../../../src/channel/ssh-channel.js'

vi.mock('../../../src/util/exec.js', () => ({
  execCommandFull: vi.fn(),
}))

import { execCommandFull } from '../../../src/util/exec.js'

const mockExec = vi.mocked(execCommandFull)

const BASE = ['-o', 'BatchMode=yes', '-o', 'ConnectTimeout=10']

beforeEach(() => {
  vi.resetAllMocks()
})

describe('SshChannel', () => {
  const channel = new SshChannel({ host: '10.11.99.1', user: 'root' })

  describe('describe', () => {
    it('renders user@host', () => {
      expect(channel.describe()).toBe('root@10.11.99.1')
    })

    it('includes a non-default port', () => {
      expect(new SshChannel({ host: 'rm.local', user: 'root', port: 2222 }).describe()).toBe('root@rm.local:2222')
    })
  })

  describe('exec', () => {
    it('runs the command over ssh in batch mode', async () => {
      mockExec.mockResolvedValue({ stdout: 'out', stderr: '', exitCode: 0 })
      const result = await channel.exec('md5sum /usr/bin/xochitl')
      expect(result).toEqual({ ok: true, value: { stdout: 'out', stderr: '', exitCode: 0 } })
      expect(mockExec).toHaveBeenCalledWith('ssh', [...BASE, 'root@10.11.99.1', 'md5sum /usr/bin/xochitl'])
    })

    it('passes identity file, port and timeout', async () => {
      mockExec.mockResolvedValue({ stdout: '', stderr: '', exitCode: 0 })
      const configured = new SshChannel({
        host: 'rm.local',
        user: 'admin',
        port: 2222,
        identityFile: '/home/me/.ssh/id_rm',
        connectTimeoutSeconds: 5,
      })
      await configured.exec('exit')
      expect(mockExec).toHaveBeenCalledWith('ssh', [
        '-o',
        'BatchMode=yes',
        '-o',
        'ConnectTimeout=5',
        '-i',
        '/home/me/.ssh/id_rm',
        '-p',
        '2222',
        'admin@rm.local',
        'exit',
      ])
    })

    it('resolves ok with the exit code when the remote command fails', async () => {
      mockExec.mockResolvedValue({ stdout: '', stderr: 'no such unit', exitCode: 5 })
      const result = await channel.exec('systemctl restart nope')
      expect(result).toEqual({ ok: true, value: { stdout: '', stderr: 'no such unit', exitCode: 5 } })
    })

    it('fails when ssh itself fails', async () => {
      mockExec.mockResolvedValue({
        stdout: '',
        stderr: 'ssh: connect to host 10.11.99.1 port 22: No route to host\n',
        exitCode: 255,
      })
      const result = await channel.exec('exit')
      expect(result).toEqual({
        ok: false,
        error: {
          operation: 'exec',
          message: 'ssh to root@10.11.99.1 failed: ssh: connect to host 10.11.99.1 port 22: No route to host',
          exitCode: 255,
        },
      })
    })

    it('fails when ssh cannot be started', async () => {
      mockExec.mockRejectedValue(new Error('spawn ssh ENOENT'))
      const result = await channel.exec('exit')
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.message).toBe('Could not run ssh: spawn ssh ENOENT')
      }
    })
  })

  describe('probe', () => {
    it('succeeds when the session opens', async () => {
      mockExec.mockResolvedValue({ stdout: '', stderr: '', exitCode: 0 })
      expect(await channel.probe()).toEqual({ ok: true, value: undefined })
      expect(mockExec).toHaveBeenCalledWith('ssh', [...BASE, 'root@10.11.99.1', 'exit'])
    })

    it('reports an unreachable device as a probe failure', async () => {
      mockExec.mockResolvedValue({ stdout: '', stderr: 'Connection timed out', exitCode: 255 })
      const result = await channel.probe()
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.operation).toBe('probe')
        expect(result.error.exitCode).toBe(255)
      }
    })
  })

  describe('pull', () => {
    it('copies the remote file into memory and removes the temporary copy', async () => {
      let localPath = ''
      mockExec.mockImplementation(async (_command, args) => {
        localPath = args[args.length - 1] ?? ''
        await fs.writeFile(localPath, Buffer.from([1, 2, 3]))
        return { stdout: '', stderr: '', exitCode: 0 }
      })
      const result = await channel.pull('/usr/bin/xochitl')
      expect(result.ok && Array.from(result.value)).toEqual([1, 2, 3])
      expect(mockExec).toHaveBeenCalledWith('scp', ['-q', ...BASE, 'root@10.11.99.1:/usr/bin/xochitl', localPath])
      await expect(fs.access(localPath)).rejects.toThrow()
    })

    it('brackets IPv6 hosts in the scp location', async () => {
      mockExec.mockResolvedValue({ stdout: '', stderr: 'boom', exitCode: 1 })
      await new SshChannel({ host: 'fe80::1', user: 'root' }).pull('/usr/bin/xochitl')
      expect(mockExec.mock.calls[0]?.[1]).toContain('root@[fe80::1]:/usr/bin/xochitl')
    })

    it('uses -P for the scp port', async () => {
      mockExec.mockResolvedValue({ stdout: '', stderr: 'boom', exitCode: 1 })
      await new SshChannel({ host: 'rm.local', user: 'root', port: 2222 }).pull('/x')
      const args = mockExec.mock.calls[0]?.[1] ?? []
      expect(args.slice(0, 7)).toEqual(['-q', ...BASE, '-P', '2222'])
    })

    it('fails when scp exits non-zero', async () => {
      mockExec.mockResolvedValue({ stdout: '', stderr: 'scp: /usr/bin/xochitl: No such file or directory\n', exitCode: 1 })
      const result = await channel.pull('/usr/bin/xochitl')
      expect(result).toEqual({
        ok: false,
        error: {
          operation: 'pull',
          message: 'Copying /usr/bin/xochitl from root@10.11.99.1 failed: scp: /usr/bin/xochitl: No such file or directory',
          exitCode: 1,
        },
      })
    })
  })

  describe('push', () => {
    it('writes the bytes to an executable temporary file and copies it over', async () => {
      let pushed: Buffer | undefined
      let mode = 0
      mockExec.mockImplementation(async (_command, args) => {
        const localPath = args[args.length - 2] ?? ''
        pushed = await fs.readFile(localPath)
        mode = (await fs.stat(localPath)).mode & 0o777
        return { stdout: '', stderr: '', exitCode: 0 }
      })
      const result = await channel.push(new Uint8Array([9, 8, 7]), '/usr/bin/xochitl.devpatch-new')
      expect(result).toEqual({ ok: true, value: undefined })
      expect(pushed?.toString('hex')).toBe('090807')
      expect(mode & 0o100).toBe(0o100)
      expect(mockExec.mock.calls[0]?.[1].at(-1)).toBe('root@10.11.99.1:/usr/bin/xochitl.devpatch-new')
    })

    it('fails when scp exits non-zero', async () => {
      mockExec.mockResolvedValue({ stdout: '', stderr: 'scp: write failed: No space left on device', exitCode: 1 })
      const result = await channel.push(new Uint8Array([1]), '/usr/bin/xochitl.devpatch-new')
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.operation).toBe('push')
        expect(result.error.message).toContain('No space left on device')
      }
    })
  })
})
