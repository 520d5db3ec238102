import {Command, Flags} from '@oclif/core'
import {mkdir, writeFile} from 'node:fs/promises'
import {resolve} from 'node:path'
import {getMemoryPath, getSkiffHome} from '../config/paths.js'

export default class Init extends Command {
  static override description = 'Write a project config and the global skiff home'

  static override flags = {
    force: Flags.boolean({char: 'f', description: 'overwrite existing files'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Init)
    const flag = flags.force ? 'w' : 'wx'
    const targetDir = process.cwd()
    const homeDir = getSkiffHome()
    const memoryPath = getMemoryPath(homeDir)
    const configPath = resolve(targetDir, '.skiffrc.json')
    const envExamplePath = resolve(homeDir, '.env.example')

    await mkdir(homeDir, {recursive: true})
    await writeFile(
      configPath,
      JSON.stringify(
        {
          provider: 'openai',
          model: '',
          baseURL: '',
          history: {maxMessages: 0, maxTokens: 0},
          runtime: {maxToolRounds: 10}
        },
        null,
        2
      ) + '\n',
      {flag}
    )
    await writeFile(envExamplePath, 'OPENAI_API_KEY=\nOPENAI_MODEL=gpt-4o-mini\nOPENAI_BASE_URL=\n', {flag})
    await writeFile(
      memoryPath,
      '# Project memory\n\n- Stack layout, naming conventions and anything the assistant should always know.\n',
      {flag}
    )

    this.log(`Created ${configPath}`)
    this.log(`Created ${envExamplePath}`)
    this.log(`Created ${memoryPath}`)
  }
}
