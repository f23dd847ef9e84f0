// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { ShutdownMode } from '@/actors/ActorConfig'
import { LocalStage } from '@/actors/LocalStage'
import { SendError, SendErrorKind, SendResult } from '@/actors/SendError'
import { err, ok } from '@/actors/Task'
import { Gate } from '@/actors/testkit/Gate'
import { awaitAssert } from '@/actors/testkit/TestAwaitAssist'
import { TestDeadLettersListener } from '@/actors/testkit/TestDeadLettersListener'
import { TestLogger } from '@/actors/testkit/TestLogger'

function refusal(result: SendResult): SendError {
  if (result.accepted) {
    throw new Error('Expected the send to be refused')
  }
  return result.error
}

describe('Actor shutdown', () => {
  let logger: TestLogger
  let stage: LocalStage
  let deadLetters: TestDeadLettersListener

  beforeEach(() => {
    logger = new TestLogger()
    stage = new LocalStage(logger)
    deadLetters = new TestDeadLettersListener()
    stage.deadLetters().registerListener(deadLetters)
  })

  afterEach(async () => {
    await stage.close()
  })

  describe('Releasing handles', () => {
    it('should drain queued tasks when the last handle is released', async () => {
      const gate = new Gate()
      const ran: number[] = []
      const actor = stage.spawn({ name: 'drainer' })

      await actor.send(async () => {
        await gate.wait()
        return ok()
      })
      for (const i of [1, 2, 3]) {
        await actor.send(() => {
          ran.push(i)
          return ok()
        })
      }

      const released = actor.release()

      expect(actor.isReleased()).toBe(true)
      expect(actor.isStopped()).toBe(true)

      gate.open()
      await released

      expect(ran).toEqual([1, 2, 3])
      expect(stage.actorCount()).toBe(0)
      expect(deadLetters.count()).toBe(0)
    })

    it('should keep the actor alive while a clone remains', async () => {
      const actor = stage.spawn()
      const copy = actor.clone()

      await actor.release()

      expect(copy.isStopped()).toBe(false)
      expect(copy.handleCount()).toBe(1)
      expect(await copy.sendAndWait(() => ok(1))).toEqual({ status: 'success', value: 1 })

      await copy.release()

      expect(copy.isStopped()).toBe(true)
      expect(stage.actorCount()).toBe(0)
    })

    it('should refuse sends through a released handle', async () => {
      const actor = stage.spawn({ name: 'released' })
      const copy = actor.clone()

      await actor.release()

      const error = refusal(await actor.send(function deposit() { return ok() }))

      expect(error.kind()).toBe(SendErrorKind.Closed)
      expect(error.message).toBe('Actor handle is released')
      expect(await actor.sendAndWait(() => ok())).toEqual({ status: 'shutdown' })
      expect(deadLetters.count()).toBe(2)
      expect(deadLetters.first()?.message()).toBe('deposit()')
      expect(deadLetters.first()?.reason()).toBe('Actor handle is released')
      expect(copy.isStopped()).toBe(false)
    })

    it('should ignore a second release', async () => {
      const actor = stage.spawn()
      const copy = actor.clone()

      await actor.release()
      await actor.release()

      expect(copy.handleCount()).toBe(1)
      expect(copy.isStopped()).toBe(false)
    })

    it('should answer queued tasks with shutdown on release under Immediate', async () => {
      const gate = new Gate()
      const actor = stage.spawn({ name: 'hasty', shutdownMode: ShutdownMode.Immediate })

      const inFlight = actor.sendAndWait(async () => {
        await gate.wait()
        return ok('finished')
      })
      const queued = [
        actor.sendAndWait(function second() { return ok() }),
        actor.sendAndWait(function third() { return ok() })
      ]
      await awaitAssert(() => {
        expect(gate.waiting()).toBe(1)
      })

      const released = actor.release()
      gate.open()
      await released

      expect(await inFlight).toEqual({ status: 'success', value: 'finished' })
      expect(await Promise.all(queued)).toEqual([{ status: 'shutdown' }, { status: 'shutdown' }])
      expect(deadLetters.all().map(each => each.message())).toEqual(['second()', 'third()'])
      expect(deadLetters.findByReason('shutdown')).toHaveLength(2)
    })
  })

  describe('Stopping', () => {
    it('should refuse new tasks after stop', async () => {
      const actor = stage.spawn({ name: 'stopped' })

      await actor.stop()

      const error = refusal(await actor.send(() => ok()))

      expect(actor.isStopped()).toBe(true)
      expect(error.kind()).toBe(SendErrorKind.Closed)
      expect(error.message).toBe('Actor mailbox is closed')
      expect(await actor.sendAndWait(() => ok())).toEqual({ status: 'shutdown' })
      expect(deadLetters.count()).toBe(2)
      expect(deadLetters.latest()?.reason()).toBe('Actor mailbox is closed')
    })

    it('should stop every handle', async () => {
      const actor = stage.spawn()
      const copy = actor.clone()

      await copy.stop()

      expect(actor.isStopped()).toBe(true)
      expect(await actor.sendAndWait(() => ok())).toEqual({ status: 'shutdown' })
    })

    it('should run queued tasks on a graceful stop', async () => {
      const gate = new Gate()
      const actor = stage.spawn()

      await actor.send(async () => {
        await gate.wait()
        return ok()
      })
      const queued = actor.sendAndWait(() => ok('ran'))

      const stopped = actor.stop(ShutdownMode.Graceful)
      gate.open()
      await stopped

      expect(await queued).toEqual({ status: 'success', value: 'ran' })
    })

    it('should reject queued tasks on an immediate stop', async () => {
      const gate = new Gate()
      const actor = stage.spawn()

      await actor.send(async () => {
        await gate.wait()
        return ok()
      })
      const queued = actor.sendAndWait(() => ok('ran'))
      await awaitAssert(() => {
        expect(gate.waiting()).toBe(1)
      })

      const stopped = actor.stop(ShutdownMode.Immediate)
      gate.open()
      await stopped

      expect(await queued).toEqual({ status: 'shutdown' })
    })

    it('should not start a task handed to an idle actor once stopped immediately', async () => {
      let ran = false
      const actor = stage.spawn({ name: 'idle' })

      const outcome = actor.sendAndWait(function late() {
        ran = true
        return ok()
      })
      await actor.stop(ShutdownMode.Immediate)

      expect(await outcome).toEqual({ status: 'shutdown' })
      expect(ran).toBe(false)
      expect(deadLetters.count()).toBe(1)
      expect(deadLetters.first()?.message()).toBe('late()')
      expect(deadLetters.first()?.reason()).toBe('shutdown')
    })

    it('should not start a task sent just before the last handle is released under Immediate', async () => {
      let ran = false
      const actor = stage.spawn({ shutdownMode: ShutdownMode.Immediate })

      const sent = actor.send(() => {
        ran = true
        return ok()
      })
      await actor.release()

      expect(await sent).toEqual({ accepted: true })
      expect(ran).toBe(false)
      expect(deadLetters.findByReason('shutdown')).toHaveLength(1)
    })

    it('should reject what a graceful stop left queued on a later immediate stop', async () => {
      const gate = new Gate()
      const actor = stage.spawn()

      await actor.send(async () => {
        await gate.wait()
        return ok()
      })
      const queued = actor.sendAndWait(() => ok('ran'))
      await awaitAssert(() => {
        expect(gate.waiting()).toBe(1)
      })

      const graceful = actor.stop(ShutdownMode.Graceful)
      const immediate = actor.stop(ShutdownMode.Immediate)
      gate.open()

      await graceful
      await immediate

      expect(await queued).toEqual({ status: 'shutdown' })
    })

    it('should answer poisoned rather than shutdown for tasks drained after poisoning', async () => {
      const actor = stage.spawn()

      const failed = actor.sendAndWait(() => err('disk full'))
      const queued = actor.sendAndWait(() => ok())

      await actor.stop()

      expect(await failed).toEqual({ status: 'failure', reason: 'disk full' })
      expect(await queued).toEqual({ status: 'poisoned', reason: 'disk full' })
    })

    it('should log the stop', async () => {
      const actor = stage.spawn({ name: 'logged' })

      await actor.stop(ShutdownMode.Immediate)

      expect(logger.messages('log')).toEqual([
        `Actor: logged At: ${actor.address().valueAsString()} subject: stop(Immediate)`
      ])
    })
  })
})
