import { z } from 'zod'
import { MemoryBroker } from '../broker'
import { StageAlreadyBuilt, StageConfigurationIncomplete } from '../error'
import { jsonCodec, StageDefinition, success } from '../transform'
import { Stage } from './stage'

describe('StageConfigurationBuilder', () => {
  const schema = z.unknown()
  const definition: StageDefinition<unknown, unknown> = {
    codec: jsonCodec(schema, schema),
    transform: async input => success(input)
  }

  describe('when all required settings are provided', () => {
    const sut = Stage.configure('asr-mt-relay', definition)
      .fromQueue('ASR_output')
      .toQueue('MT_input')
      .withConnector(new MemoryBroker())
      .withInterruptSignals()
      .build()

    it('should apply defaults to the remaining settings', () => {
      expect(sut.configuration).toMatchObject({
        name: 'asr-mt-relay',
        inputQueue: 'ASR_output',
        outputQueue: 'MT_input',
        logQueue: 'log_queue',
        consumption: { mode: 'poll' },
        idleDelayMs: 1000,
        unexpectedErrorDelayMs: 5000,
        maxAttempts: undefined,
        interruptSignals: []
      })
    })

    it('should freeze the configuration', () => {
      expect(Object.isFrozen(sut.configuration)).toEqual(true)
    })
  })

  describe('when interrupt signals are configured', () => {
    const signals: NodeJS.Signals[] = ['SIGTERM']
    const sut = Stage.configure('asr-mt-relay', definition)
      .fromQueue('ASR_output')
      .withConnector(new MemoryBroker())
      .withInterruptSignals(...signals)
      .build()

    it('should freeze a copy of the signal list', () => {
      signals.push('SIGINT')

      expect(sut.configuration.interruptSignals).toEqual(['SIGTERM'])
      expect(Object.isFrozen(sut.configuration.interruptSignals)).toEqual(true)
    })
  })

  describe('when configuring push consumption', () => {
    it('should record the prefetch', () => {
      const sut = Stage.configure('delivery', definition)
        .fromQueue('TTS_output')
        .withConnector(new MemoryBroker())
        .withPushConsumption()
        .build()

      expect(sut.configuration.consumption).toEqual({ mode: 'push', prefetch: 1 })
      expect(sut.configuration.outputQueue).toBeUndefined()
    })

    it('should reject a prefetch below 1', () => {
      expect(() => Stage.configure('delivery', definition).withPushConsumption(0)).toThrow(
        'Invalid prefetch provided, must be a positive integer'
      )
    })
  })

  describe('when no connector is configured', () => {
    it('should throw StageConfigurationIncomplete', () => {
      const builder = Stage.configure('translation', definition).fromQueue('MT_input')
      expect(() => builder.build()).toThrow(StageConfigurationIncomplete)
    })
  })

  describe('when no input queue is configured', () => {
    it('should name the missing setting', () => {
      const builder = Stage.configure('translation', definition).withConnector(new MemoryBroker())
      expect(() => builder.build()).toThrow(`Stage 'translation' can't be built without an input queue`)
    })
  })

  describe('when configured after being built', () => {
    it('should throw StageAlreadyBuilt', () => {
      const builder = Stage.configure('translation', definition)
        .fromQueue('MT_input')
        .withConnector(new MemoryBroker())
      builder.build()

      expect(() => builder.toQueue('MT_output')).toThrow(StageAlreadyBuilt)
      expect(() => builder.build()).toThrow(StageAlreadyBuilt)
    })
  })
})
