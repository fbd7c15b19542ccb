import { StageDefinition } from '../transform'
import { StageConfigurationBuilder } from './stage-configuration-builder'

export class Stage {
  private constructor() {}

  /**
   * Configures a stage prior to use
   * @param name Identifies the stage in logs
   * @param definition The codec and transform that give the stage its behaviour
   */
  static configure<TInput, TOutput>(
    name: string,
    definition: StageDefinition<TInput, TOutput>
  ): StageConfigurationBuilder<TInput, TOutput> {
    return new StageConfigurationBuilder(name, definition)
  }
}
