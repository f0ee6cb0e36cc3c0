import * as core from '@actions/core'
import * as exec from '@actions/exec'

/**
 * A helm invocation that exited with a non-zero code
 */
export class HelmCommandError extends Error {
  readonly args: string[]
  readonly exitCode: number
  readonly stderr: string

  constructor(args: string[], exitCode: number, stderr: string) {
    const details = stderr.trim()
    super(
      `helm ${args.join(' ')} failed with exit code ${exitCode}${details ? `: ${details}` : ''}`
    )
    this.name = 'HelmCommandError'
    this.args = args
    this.exitCode = exitCode
    this.stderr = stderr
  }
}

interface RunOptions {
  /** Written to the process's stdin */
  input?: string
}

/**
 * The helm commands the packaging pipeline runs, executed in the chart
 * directory
 */
export class HelmCli {
  private readonly chartPath: string
  private readonly binary: string

  constructor(chartPath: string, binary: string = 'helm') {
    this.chartPath = chartPath
    this.binary = binary
  }

  private async run(args: string[], options: RunOptions = {}): Promise<string> {
    core.debug(`Running ${this.binary} ${args.join(' ')} in ${this.chartPath}`)

    const result = await exec.getExecOutput(this.binary, args, {
      cwd: this.chartPath,
      ignoreReturnCode: true,
      ...(options.input !== undefined ? { input: Buffer.from(options.input) } : {})
    })

    if (result.exitCode !== 0) {
      throw new HelmCommandError(args, result.exitCode, result.stderr)
    }
    return result.stdout
  }

  async version(): Promise<string> {
    return (await this.run(['version', '--short'])).trim()
  }

  async dependencyBuild(): Promise<void> {
    await this.run(['dependency', 'build'])
  }

  async lint(): Promise<void> {
    await this.run(['lint', '--strict', '--with-subcharts', '.'])
  }

  async package(): Promise<void> {
    await this.run(['package', '.'])
  }

  async registryLogin(registry: string, username: string, password: string): Promise<void> {
    await this.run(
      ['registry', 'login', registry, '--username', username, '--password-stdin'],
      { input: password }
    )
  }

  async push(archive: string, repository: string): Promise<void> {
    await this.run(['push', archive, repository])
  }
}
