export class InvalidRelayConfiguration extends Error {
  readonly help: string

  constructor(
    message: string,
    readonly source: string
  ) {
    super(message)
    this.help = `Check the configuration file at ${source} and the BROKER_URL, RELAY_INPUT_LANG, RELAY_OUTPUT_LANG and RELAY_GENDER environment variables`

    Object.setPrototypeOf(this, new.target.prototype)
  }
}
