export class StageConfigurationIncomplete extends Error {
  constructor(
    readonly stageName: string,
    readonly missingSetting: string
  ) {
    super(`Stage '${stageName}' can't be built without ${missingSetting}`)

    Object.setPrototypeOf(this, new.target.prototype)
  }
}
