import { Mock, Times } from 'typemoq'
import { TypedEmitter } from './typed-emitter'

describe('TypedEmitter', () => {
  let sut: TypedEmitter<string>

  beforeEach(() => {
    sut = new TypedEmitter()
  })

  describe('when a listener is subscribed', () => {
    const callback = Mock.ofType<(event: string) => void>()

    beforeEach(() => {
      callback.reset()
      sut.on(callback.object)
      sut.emit('one')
      sut.emit('two')
    })

    it('should receive every event', () => {
      callback.verify(invocation => invocation('one'), Times.once())
      callback.verify(invocation => invocation('two'), Times.once())
    })
  })

  describe('when a listener unsubscribes', () => {
    it('should not receive later events', () => {
      const received: string[] = []
      const unsubscribe = sut.on(event => received.push(event))

      sut.emit('one')
      unsubscribe()
      sut.emit('two')

      expect(received).toEqual(['one'])
      expect(sut.listenerCount).toEqual(0)
    })

    it('should let the other listeners of the same event run when it unsubscribes mid-emit', () => {
      const received: string[] = []
      const unsubscribe = sut.on(() => unsubscribe())
      sut.on(event => received.push(event))

      sut.emit('one')
      sut.emit('two')

      expect(received).toEqual(['one', 'two'])
    })
  })
})
