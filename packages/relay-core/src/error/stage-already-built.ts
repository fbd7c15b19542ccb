export class StageAlreadyBuilt extends Error {
  readonly help: string

  constructor(readonly stageName: string) {
    super(`Attempted to configure stage '${stageName}' after it has been built`)
    this.help = `Ensure all configuration operations happen once at startup, before calling .build()`

    Object.setPrototypeOf(this, new.target.prototype)
  }
}
