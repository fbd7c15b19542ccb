import { Mock } from 'typemoq'
import { z } from 'zod'
import { MemoryBroker } from '../broker'
import { InvalidStageState } from '../error'
import { LogEntry } from '../log-sink'
import { Logger } from '../logger'
import {
  apiFailure,
  domainFailure,
  jsonCodec,
  StageDefinition,
  success,
  TransformResult
} from '../transform'
import { Stage } from './stage'
import { AfterQuarantine, ATTEMPT_HEADER, IterationOutcome, OnError, StageProcessor } from './stage-processor'
import { StageState } from './stage-state'

const textSchema = z.object({ text: z.string().min(1) })
type Text = z.infer<typeof textSchema>

describe('StageProcessor', () => {
  let broker: MemoryBroker
  let transform: jest.Mock<Promise<TransformResult<Text>>, [Text]>
  let sut: StageProcessor<Text, Text>

  const definition = (): StageDefinition<Text, Text> => ({
    codec: jsonCodec(textSchema, textSchema),
    transform: async input => transform(input)
  })

  const configure = () =>
    Stage.configure('translation', definition())
      .fromQueue('MT_input')
      .withConnector(broker)
      .withLogger(() => Mock.ofType<Logger>().object)
      .withInterruptSignals()

  const logEntries = (): LogEntry[] =>
    broker.messages('log_queue').map(entry => JSON.parse(entry.toString()))

  beforeEach(() => {
    broker = new MemoryBroker()
    transform = jest.fn<Promise<TransformResult<Text>>, [Text]>(async input =>
      success({ text: input.text.toUpperCase() })
    )
    sut = configure().toQueue('MT_output').build()
  })

  describe('when the transform succeeds', () => {
    beforeEach(() => {
      broker.enqueue('MT_input', '{"text":"hola"}')
    })

    it('should publish the output and acknowledge the input', async () => {
      const result = await sut.tick()

      expect(result).toEqual({ outcome: IterationOutcome.Forwarded, delayMs: 0 })
      expect(broker.messages('MT_output').map(m => m.toString())).toEqual(['{"text":"HOLA"}'])
      expect(broker.settlements).toEqual([{ deliveryTag: 1, action: 'ack' }])
      expect(broker.depth('MT_input')).toEqual(0)
      expect(broker.inFlightCount).toEqual(0)
    })

    it('should log the publish', async () => {
      await sut.tick()
      expect(logEntries()).toContainEqual({
        level: 'INFO',
        message: 'Successfully published to MT_output'
      })
    })

    it('should emit afterAck', async () => {
      const afterAck = jest.fn()
      sut.afterAck.on(afterAck)
      await sut.tick()

      expect(afterAck).toHaveBeenCalledTimes(1)
    })
  })

  describe('when the transform reports a domain failure', () => {
    beforeEach(async () => {
      transform.mockResolvedValue(domainFailure('model unavailable'))
      broker.enqueue('MT_input', '{"text":"hola"}')
    })

    it('should return the message to the input queue', async () => {
      const result = await sut.tick()

      expect(result.outcome).toEqual(IterationOutcome.Requeued)
      expect(broker.settlements).toEqual([{ deliveryTag: 1, action: 'nack', requeue: true }])
      expect(broker.depth('MT_input')).toEqual(1)
      expect(broker.depth('MT_output')).toEqual(0)
    })

    it('should log the failure', async () => {
      await sut.tick()
      expect(logEntries()).toContainEqual({
        level: 'WARNING',
        message: `Service reported a non-success status: model unavailable. Returning message to 'MT_input'`
      })
    })
  })

  describe('when the transform times out', () => {
    it('should redeliver the same message on the next iteration', async () => {
      transform.mockResolvedValueOnce(apiFailure('timeout'))
      broker.enqueue('MT_input', '{"text":"hola"}')

      expect((await sut.tick()).outcome).toEqual(IterationOutcome.Requeued)
      expect((await sut.tick()).outcome).toEqual(IterationOutcome.Forwarded)

      expect(transform).toHaveBeenCalledTimes(2)
      expect(transform).toHaveBeenNthCalledWith(2, { text: 'hola' })
      expect(broker.messages('MT_output').map(m => m.toString())).toEqual(['{"text":"HOLA"}'])
    })
  })

  describe('when the input is malformed', () => {
    const malformed = Buffer.from('{text: hola')

    beforeEach(() => {
      broker.enqueue('MT_input', malformed)
    })

    it('should copy the payload verbatim to the dead-letter queue and acknowledge it', async () => {
      const result = await sut.tick()

      expect(result.outcome).toEqual(IterationOutcome.Quarantined)
      expect(broker.messages('MT_input_malformedjson')).toEqual([malformed])
      expect(broker.settlements).toEqual([{ deliveryTag: 1, action: 'ack' }])
      expect(transform).not.toHaveBeenCalled()
    })

    it('should emit afterQuarantine', async () => {
      const quarantined: AfterQuarantine[] = []
      sut.afterQuarantine.on(event => quarantined.push(event))
      await sut.tick()

      expect(quarantined).toHaveLength(1)
      expect(quarantined[0].deadLetterQueue).toEqual('MT_input_malformedjson')
    })

    it('should requeue the message if the dead-letter queue rejects it', async () => {
      broker.rejectPublishesTo('MT_input_malformedjson')
      const result = await sut.tick()

      expect(result.outcome).toEqual(IterationOutcome.Requeued)
      expect(broker.settlements).toEqual([{ deliveryTag: 1, action: 'nack', requeue: true }])
      expect(broker.messages('MT_input')).toEqual([malformed])
    })
  })

  describe('when the input is not valid UTF-8', () => {
    const payload = Buffer.concat([Buffer.from('{"text":"'), Buffer.from([0xff, 0xfe]), Buffer.from('"}')])

    beforeEach(() => {
      broker.enqueue('MT_input', payload)
    })

    it('should quarantine the original bytes without forwarding anything', async () => {
      const result = await sut.tick()

      expect(result.outcome).toEqual(IterationOutcome.Quarantined)
      expect(broker.messages('MT_input_malformedjson')).toEqual([payload])
      expect(broker.depth('MT_output')).toEqual(0)
      expect(transform).not.toHaveBeenCalled()
      expect(broker.settlements).toEqual([{ deliveryTag: 1, action: 'ack' }])
    })
  })

  describe('when the transform output is malformed', () => {
    it('should quarantine the output and acknowledge the input', async () => {
      transform.mockResolvedValue(success({ text: '' }))
      broker.enqueue('MT_input', '{"text":"hola"}')

      const result = await sut.tick()

      expect(result.outcome).toEqual(IterationOutcome.Quarantined)
      expect(broker.messages('MT_input_malformedjson').map(m => m.toString())).toEqual([
        '{"text":""}'
      ])
      expect(broker.depth('MT_output')).toEqual(0)
      expect(broker.settlements).toEqual([{ deliveryTag: 1, action: 'ack' }])
    })
  })

  describe('when the output queue rejects the publish', () => {
    it('should return the input to its queue', async () => {
      broker.rejectPublishesTo('MT_output')
      broker.enqueue('MT_input', '{"text":"hola"}')

      const result = await sut.tick()

      expect(result.outcome).toEqual(IterationOutcome.Requeued)
      expect(broker.settlements).toEqual([{ deliveryTag: 1, action: 'nack', requeue: true }])
      expect(broker.depth('MT_input')).toEqual(1)
    })
  })

  describe('when the stage has no output queue', () => {
    it('should acknowledge the input without publishing', async () => {
      sut = configure().build()
      broker.enqueue('MT_input', '{"text":"hola"}')

      const result = await sut.tick()

      expect(result.outcome).toEqual(IterationOutcome.Acknowledged)
      expect(broker.settlements).toEqual([{ deliveryTag: 1, action: 'ack' }])
      expect(broker.hasQueue('MT_output')).toEqual(false)
    })
  })

  describe('when the input queue is empty', () => {
    it('should idle for the configured delay', async () => {
      await expect(sut.tick()).resolves.toEqual({ outcome: IterationOutcome.Idle, delayMs: 1000 })
      expect(sut.state).toEqual(StageState.Polling)
    })

    it('should only report the empty queue once per streak', async () => {
      await sut.tick()
      await sut.tick()

      const emptyReports = logEntries().filter(
        entry => entry.message === `Input queue 'MT_input' is currently empty.`
      )
      expect(emptyReports).toHaveLength(1)
    })
  })

  describe('when the broker is unavailable', () => {
    it('should back off exponentially between reconnect attempts', async () => {
      broker.failNextConnects(3)

      const delays = [await sut.tick(), await sut.tick(), await sut.tick()].map(r => r.delayMs)
      expect(delays).toEqual([1000, 2000, 4000])
      expect(sut.state).toEqual(StageState.Disconnected)
      expect(transform).not.toHaveBeenCalled()

      await expect(sut.tick()).resolves.toEqual({ outcome: IterationOutcome.Idle, delayMs: 1000 })
      expect(broker.connectAttempts).toEqual(4)
    })

    it('should reset the backoff after a successful reconnect', async () => {
      broker.failNextConnects(2)
      await sut.tick()
      await sut.tick()
      await sut.tick()

      broker.dropConnections()
      broker.failNextConnects(1)

      await expect(sut.tick()).resolves.toEqual({
        outcome: IterationOutcome.Reconnecting,
        delayMs: 1000
      })
    })
  })

  describe('when the connection drops while a message is processed', () => {
    it('should leave the message unsettled for redelivery and reconnect', async () => {
      transform.mockImplementationOnce(async input => {
        broker.dropConnections()
        return success(input)
      })
      broker.enqueue('MT_input', '{"text":"hola"}')

      const result = await sut.tick()

      expect(result).toEqual({ outcome: IterationOutcome.Reconnecting, delayMs: 1000 })
      expect(broker.settlements).toEqual([])
      expect(broker.depth('MT_input')).toEqual(1)

      expect((await sut.tick()).outcome).toEqual(IterationOutcome.Forwarded)
    })
  })

  describe('when the transform throws unexpectedly', () => {
    const failure = new Error('Unexpected token in inference response')

    beforeEach(() => {
      transform.mockRejectedValueOnce(failure)
      broker.enqueue('MT_input', '{"text":"hola"}')
    })

    it('should pause for the unexpected error delay', async () => {
      await expect(sut.tick()).resolves.toEqual({ outcome: IterationOutcome.Faulted, delayMs: 5000 })
      expect(sut.state).toEqual(StageState.Disconnected)
    })

    it('should emit onError and return the message to the queue', async () => {
      const errors: OnError[] = []
      sut.onError.on(event => errors.push(event))
      await sut.tick()

      expect(errors).toHaveLength(1)
      expect(errors[0].error).toBe(failure)
      expect(broker.settlements).toEqual([])
      expect(broker.depth('MT_input')).toEqual(1)
    })
  })

  describe('when a maximum number of attempts is configured', () => {
    beforeEach(() => {
      sut = configure().toQueue('MT_output').withMaxAttempts(2).build()
      transform.mockResolvedValue(apiFailure('http:503'))
      broker.enqueue('MT_input', '{"text":"hola"}')
    })

    it('should republish failed messages with an attempt count', async () => {
      const result = await sut.tick()

      expect(result.outcome).toEqual(IterationOutcome.Retried)
      expect(broker.headersOf('MT_input')).toEqual([{ [ATTEMPT_HEADER]: 1 }])
      expect(broker.settlements).toEqual([{ deliveryTag: 1, action: 'ack' }])
    })

    it('should quarantine the message after the last attempt', async () => {
      await sut.tick()
      const result = await sut.tick()

      expect(result.outcome).toEqual(IterationOutcome.Quarantined)
      expect(broker.messages('MT_input_malformedjson').map(m => m.toString())).toEqual([
        '{"text":"hola"}'
      ])
      expect(broker.depth('MT_input')).toEqual(0)
    })
  })

  describe('when processing a mix of messages', () => {
    it('should settle every delivery exactly once', async () => {
      transform.mockImplementation(async input =>
        input.text === 'fail' ? apiFailure('network') : success(input)
      )
      ;['{"text":"one"}', '{broken', '{"text":""}', '{"text":"two"}', '{"text":"fail"}'].forEach(
        payload => broker.enqueue('MT_input', payload)
      )

      for (let i = 0; i < 5; i++) {
        await sut.tick()
      }

      const deliveryTags = broker.settlements.map(settlement => settlement.deliveryTag)
      expect(deliveryTags).toHaveLength(5)
      expect(new Set(deliveryTags).size).toEqual(5)
      expect(broker.inFlightCount).toEqual(0)
      expect(broker.depth('MT_output')).toEqual(2)
      expect(broker.depth('MT_input_malformedjson')).toEqual(2)
      expect(broker.messages('MT_input').map(m => m.toString())).toEqual(['{"text":"fail"}'])
    })
  })

  describe('when started', () => {
    beforeEach(() => {
      sut = configure().toQueue('MT_output').withIdleDelay(10).build()
    })

    it('should process messages until stopped', async () => {
      const acknowledged = new Promise<void>(resolve => {
        const unsubscribe = sut.afterAck.on(() => {
          unsubscribe()
          resolve()
        })
      })
      broker.enqueue('MT_input', '{"text":"hola"}')

      await sut.start()
      await acknowledged
      await sut.stop()

      expect(sut.state).toEqual(StageState.Stopped)
      expect(broker.depth('MT_output')).toEqual(1)
    })

    it('should not start twice', async () => {
      await sut.start()
      await expect(sut.start()).rejects.toBeInstanceOf(InvalidStageState)
      await sut.stop()
    })

    it('should not stop when not started', async () => {
      await expect(sut.stop()).rejects.toBeInstanceOf(InvalidStageState)
    })
  })
})
