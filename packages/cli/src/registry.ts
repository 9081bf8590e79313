export type CliCommand = {
  command: string
  description?: string
  run: (args: string[]) => Promise<void> | void
}

export type CliModule = {
  id: string
  cli: CliCommand[]
}

// Command modules contributed by code that embeds the CLI
let _cliModules: CliModule[] | null = null

export function registerCliModules(modules: CliModule[]) {
  _cliModules = modules
}

export function getCliModules(): CliModule[] {
  // Built-in commands work without any registration
  return _cliModules ?? []
}

export function hasCliModules(): boolean {
  return _cliModules !== null && _cliModules.length > 0
}
