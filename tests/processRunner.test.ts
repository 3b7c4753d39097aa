import { EventEmitter } from 'node:events'
import { PassThrough } from 'node:stream'
import { describe, it, expect, vi } from 'vitest'
import { NodeProcessRunner, type OutputLine, type SpawnedProcess } from '@/core/services/processRunner'

class FakeChild extends EventEmitter implements SpawnedProcess {
  readonly stdout = new PassThrough()
  readonly stderr = new PassThrough()
  pid: number | undefined = 4242
  killed = false

  kill(): boolean {
    this.killed = true
    return true
  }
}

function setup(child = new FakeChild()) {
  const spawn = vi.fn((_command: string, _args: string[], _options: { cwd: string }) => child)
  const lines: OutputLine[] = []
  const runner = new NodeProcessRunner({ spawn })
  return { child, spawn, lines, runner, onLine: (line: OutputLine) => lines.push(line) }
}

describe('NodeProcessRunner', () => {
  it('runs the script unbuffered from its own directory', () => {
    const { spawn, runner, onLine } = setup()

    runner.run('/work/scripts/hello.py', onLine)

    expect(spawn).toHaveBeenCalledWith('python3', ['-u', '/work/scripts/hello.py'], { cwd: '/work/scripts' })
  })

  it('delivers every line before reporting the exit code', async () => {
    const { child, lines, runner, onLine } = setup()

    const handle = runner.run('/work/hello.py', onLine)
    child.stdout.write('hello\nwor')
    child.stdout.end('ld\n')
    child.stderr.end('Traceback\n')
    child.emit('close', 1)

    expect(await handle.exited).toBe(1)
    expect(lines.filter((line) => line.stream === 'stdout')).toEqual([
      { stream: 'stdout', text: 'hello' },
      { stream: 'stdout', text: 'world' },
    ])
    expect(lines.filter((line) => line.stream === 'stderr')).toEqual([{ stream: 'stderr', text: 'Traceback' }])
  })

  it('reports a spawn that throws as an error line', async () => {
    const runner = new NodeProcessRunner({
      spawn: () => {
        throw new Error('spawn python3 ENOENT')
      },
    })
    const lines: OutputLine[] = []

    const handle = runner.run('/work/hello.py', (line) => lines.push(line))

    expect(await handle.exited).toBeNull()
    expect(lines).toEqual([{ stream: 'system', text: '[ERROR] spawn python3 ENOENT' }])
  })

  it('settles with null when the process never starts', async () => {
    const child = new FakeChild()
    child.pid = undefined
    const { lines, runner, onLine } = setup(child)

    const handle = runner.run('/work/hello.py', onLine)
    child.emit('error', new Error('spawn python3 EACCES'))

    expect(await handle.exited).toBeNull()
    expect(lines).toEqual([{ stream: 'system', text: '[ERROR] spawn python3 EACCES' }])
  })

  it('uses a configured interpreter', () => {
    const child = new FakeChild()
    const spawn = vi.fn((_command: string, _args: string[], _options: { cwd: string }) => child)
    const runner = new NodeProcessRunner({ interpreter: 'node', interpreterArgs: [], spawn })

    runner.run('/work/main.js', () => undefined)

    expect(spawn).toHaveBeenCalledWith('node', ['/work/main.js'], { cwd: '/work' })
  })

  it('kills the child', () => {
    const { child, runner, onLine } = setup()

    runner.run('/work/hello.py', onLine).kill()

    expect(child.killed).toBe(true)
  })
})
