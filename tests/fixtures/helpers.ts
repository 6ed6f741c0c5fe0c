import { promises as fs } from 'fs'
import { mkdtemp, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { dirname, join } from 'path'
import { fileURLToPath } from 'url'
import { KeyboardKey, MouseButton } from '../../src/keys'
import { getMapping, type BackendMapping, type NativeButton } from '../../src/mapping'
import { createStep } from '../../src/schemas'
import type {
  Action,
  ComputerBackend,
  ComputerObservation,
  FileChannel,
  ProcessChannel,
  ProcessInfo,
  RawMouseState,
  RawScreenshot,
  Step,
} from '../../src/types'

const __dirname = dirname(fileURLToPath(import.meta.url))

export function configPath(filename: string): string {
  return join(__dirname, 'configs', filename)
}

/**
 * Fresh temporary directory; pair with `removeTempDir` in afterEach.
 */
export async function makeTempDir(prefix = 'computer-gym-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix))
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true })
}

interface FakeProcess {
  running: boolean
  output: string[]
  input: string[]
  cwd: string
  env: Record<string, string>
}

/**
 * In-memory stand-in for a remote computer. Files live in a Map; setting
 * `failing` makes every channel call throw, as if the connection dropped.
 */
export class FakeComputer implements FileChannel, ProcessChannel {
  readonly files = new Map<string, Buffer>()
  readonly dirs = new Set<string>()
  readonly processes = new Map<number, FakeProcess>()
  failing = false
  remoteCalls = 0

  constructor(readonly tempDir: string) {}

  private check(): void {
    this.remoteCalls++
    if (this.failing) throw new Error('channel down')
  }

  async exists(remotePath: string): Promise<boolean> {
    this.check()
    return this.files.has(remotePath)
  }

  async copyFromComputer(remotePath: string, localPath: string): Promise<void> {
    this.check()
    const data = this.files.get(remotePath)
    if (!data) throw new Error(`no such remote file: ${remotePath}`)
    await fs.writeFile(localPath, data)
  }

  async copyToComputer(localPath: string, remotePath: string): Promise<void> {
    this.check()
    this.files.set(remotePath, await fs.readFile(localPath))
  }

  async makeDirs(remoteDir: string): Promise<void> {
    this.check()
    this.dirs.add(remoteDir)
  }

  text(remotePath: string): string | undefined {
    return this.files.get(remotePath)?.toString('utf-8')
  }

  spawn(pid: number, cwd = '/home/agent', env: Record<string, string> = { SHELL: '/bin/sh' }): void {
    this.processes.set(pid, { running: false, output: [], input: [], cwd, env })
  }

  emit(pid: number, output: string): void {
    this.processes.get(pid)?.output.push(output)
  }

  inputOf(pid: number): string[] {
    return this.processes.get(pid)?.input ?? []
  }

  async startProcess(pid: number): Promise<boolean> {
    this.check()
    const proc = this.processes.get(pid)
    if (!proc) return false
    proc.running = true
    return true
  }

  async stopProcess(pid: number): Promise<boolean> {
    this.check()
    const proc = this.processes.get(pid)
    if (!proc?.running) return false
    proc.running = false
    return true
  }

  async readProcessOutput(pid: number): Promise<string> {
    this.check()
    const proc = this.processes.get(pid)
    if (!proc) return ''
    return proc.output.splice(0).join('')
  }

  async sendProcessInput(pid: number, text: string): Promise<boolean> {
    this.check()
    const proc = this.processes.get(pid)
    if (!proc?.running) return false
    proc.input.push(text)
    return true
  }

  async getProcessInfo(pid: number): Promise<ProcessInfo | undefined> {
    this.check()
    const proc = this.processes.get(pid)
    return proc ? { cwd: proc.cwd, env: { ...proc.env } } : undefined
  }
}

/**
 * Backend driver double. Records every injected call as a string such as
 * `key:ctrlleft:down`; `reject` makes inject* report failure and `explode`
 * makes them throw.
 */
export class ScriptedBackend implements ComputerBackend {
  readonly calls: string[] = []
  reject = false
  explode = false
  closed = 0
  screenshot: RawScreenshot = { data: 'aGVsbG8=', format: 'png' }
  mouse: RawMouseState = { position: { x: 0, y: 0 }, pressed: [] }
  heldKeys: string[] = []

  constructor(readonly mapping: BackendMapping = getMapping('pyautogui')) {}

  private inject(call: string): boolean {
    if (this.explode) throw new Error('driver crashed')
    if (this.reject) return false
    this.calls.push(call)
    return true
  }

  async captureScreenshot(): Promise<RawScreenshot> {
    return { ...this.screenshot }
  }

  async getMouseState(): Promise<RawMouseState> {
    return { position: { ...this.mouse.position }, pressed: [...this.mouse.pressed] }
  }

  async getKeyboardState(): Promise<string[]> {
    return [...this.heldKeys]
  }

  async injectKey(key: string, down: boolean): Promise<boolean> {
    return this.inject(`key:${key}:${down ? 'down' : 'up'}`)
  }

  async injectText(text: string): Promise<boolean> {
    return this.inject(`text:${text}`)
  }

  async injectMouseMove(x: number, y: number): Promise<boolean> {
    const ok = this.inject(`move:${x},${y}`)
    if (ok) this.mouse.position = { x, y }
    return ok
  }

  async injectMouseButton(button: NativeButton, down: boolean): Promise<boolean> {
    return this.inject(`button:${button}:${down ? 'down' : 'up'}`)
  }

  async injectScroll(delta: number): Promise<boolean> {
    return this.inject(`scroll:${delta}`)
  }

  async close(): Promise<void> {
    this.closed++
  }
}

export function observationAt(x: number, y: number): ComputerObservation {
  return {
    mouseState: { type: 'mouse_state', position: { x, y }, pressed: [MouseButton.LEFT] },
    keyboardState: { type: 'keyboard_state', pressed: [KeyboardKey.LEFT_SHIFT] },
  }
}

/**
 * Step whose mouse position and reward encode `i`, so tests can tell steps apart.
 */
export function makeStep(i: number, reward = i): Step<ComputerObservation, Action> {
  return createStep<ComputerObservation, Action>(
    observationAt(i, i * 10),
    { type: 'type_text', text: `step ${i}` },
    reward,
    { index: i }
  )
}
