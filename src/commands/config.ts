import {Command, Flags} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'

export default class Config extends Command {
  static override description = 'Print resolved config'

  static override flags = {
    section: Flags.string({description: 'print one section only', options: ['history', 'runtime']})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Config)
    const config = await loadConfig()
    const output = flags.section === 'history' ? config.history : flags.section === 'runtime' ? config.runtime : config
    this.log(JSON.stringify(output, null, 2))
  }
}
