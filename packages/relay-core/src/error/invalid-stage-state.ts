import { StageState } from '../stage/stage-state'

export class InvalidStageState extends Error {
  constructor(
    message: string,
    readonly actualState: StageState,
    readonly expectedState: StageState[]
  ) {
    super(message)

    Object.setPrototypeOf(this, new.target.prototype)
  }
}
