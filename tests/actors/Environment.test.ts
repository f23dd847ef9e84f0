// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { describe, it, expect } from 'vitest'
import { ActorConfigs, ShutdownMode } from '@/actors/ActorConfig'
import { ArrayMailbox } from '@/actors/ArrayMailbox'
import { Directory, DirectoryConfigs } from '@/actors/Directory'
import { Environment } from '@/actors/Environment'
import { LocalStage } from '@/actors/LocalStage'
import type { Message } from '@/actors/Message'
import { PendingReply } from '@/actors/PendingReply'
import { ok } from '@/actors/Task'
import { TaskMessage } from '@/actors/TaskMessage'
import { Gate } from '@/actors/testkit/Gate'
import { awaitAssert } from '@/actors/testkit/TestAwaitAssist'
import { TestDeadLettersListener } from '@/actors/testkit/TestDeadLettersListener'
import { TestLogger } from '@/actors/testkit/TestLogger'
import { Uuid7Address } from '@/actors/Uuid7Address'

function environmentOn(stage: LocalStage): Environment {
  return new Environment(stage, Uuid7Address.unique(), ActorConfigs.DEFAULT, new ArrayMailbox(), stage.logger())
}

describe('Environment', () => {
  it('should report a task in flight', async () => {
    const stage = new LocalStage(new TestLogger())
    const environment = environmentOn(stage)
    const gate = new Gate()
    const reply = new PendingReply<number>()

    environment.start()

    await environment.mailbox().send(new TaskMessage(async () => {
      await gate.wait()
      return ok(1)
    }, reply, 'slow()'))

    await awaitAssert(() => {
      expect(environment.isExecuting()).toBe(true)
    })

    gate.open()

    expect(await reply.promise()).toEqual({ status: 'success', value: 1 })
    await awaitAssert(() => {
      expect(environment.isExecuting()).toBe(false)
    })

    await environment.stop(ShutdownMode.Graceful)
  })

  it('should reject queued tasks with shutdown on an immediate stop', async () => {
    const stage = new LocalStage(new TestLogger())
    const deadLetters = new TestDeadLettersListener()
    const environment = environmentOn(stage)
    const first = new PendingReply<void>()
    const second = new PendingReply<void>()

    stage.deadLetters().registerListener(deadLetters)

    await environment.mailbox().send(new TaskMessage(() => ok(), first, 'first()'))
    await environment.mailbox().send(new TaskMessage(() => ok(), second, 'second()'))

    await environment.stop(ShutdownMode.Immediate)

    expect(first.outcome()).toEqual({ status: 'shutdown' })
    expect(second.outcome()).toEqual({ status: 'shutdown' })
    expect(deadLetters.all().map(each => each.message())).toEqual(['first()', 'second()'])
  })

  it('should close the mailbox and answer queued tasks with shutdown when the loop crashes', async () => {
    const logger = new TestLogger()
    const stage = new LocalStage(logger)
    const environment = environmentOn(stage)
    const queued = new PendingReply<void>()
    const broken: Message = {
      deliver: () => Promise.reject(new Error('corrupt message')),
      reject(): void {},
      isDeliverable: () => true,
      representation: () => 'broken()',
      toString: () => 'broken'
    }

    environment.start()

    const sent = Promise.all([
      environment.mailbox().send(broken),
      environment.mailbox().send(new TaskMessage(() => ok(), queued, 'queued()'))
    ])

    expect(await sent).toEqual([{ accepted: true }, { accepted: true }])
    await awaitAssert(() => {
      expect(queued.outcome()).toEqual({ status: 'shutdown' })
    })
    expect(environment.isStopped()).toBe(true)
    expect(logger.messages('error')).toContain(`${environment} loop crashed: corrupt message`)

    await environment.stop(ShutdownMode.Graceful)
  })

  it('should return the same stop promise every time', () => {
    const environment = environmentOn(new LocalStage(new TestLogger()))

    environment.start()

    expect(environment.stop(ShutdownMode.Graceful)).toBe(environment.stop(ShutdownMode.Immediate))
  })

  it('should floor the handle count at zero', () => {
    const environment = environmentOn(new LocalStage(new TestLogger()))

    expect(environment.retainHandle()).toBe(1)
    expect(environment.releaseHandle()).toBe(0)
    expect(environment.releaseHandle()).toBe(0)
    expect(environment.handleCount()).toBe(0)
  })
})

describe('Directory', () => {
  it('should register, find, and remove actors', () => {
    const directory = new Directory(DirectoryConfigs.SMALL)
    const stage = new LocalStage(new TestLogger())
    const first = environmentOn(stage)
    const second = environmentOn(stage)

    directory.set(first.address(), first)
    directory.set(second.address(), second)

    expect(directory.size()).toBe(2)
    expect(directory.get(first.address())).toBe(first)
    expect(directory.all()).toHaveLength(2)

    expect(directory.remove(first.address())).toBe(true)
    expect(directory.remove(first.address())).toBe(false)
    expect(directory.get(first.address())).toBeUndefined()
    expect(directory.size()).toBe(1)
  })

  it('should spread many actors over its buckets', () => {
    const directory = new Directory(DirectoryConfigs.HIGH_CAPACITY)
    const stage = new LocalStage(new TestLogger())

    for (let i = 0; i < 200; i++) {
      const environment = environmentOn(stage)
      directory.set(environment.address(), environment)
    }

    expect(directory.size()).toBe(200)
  })

  it('should reject a bucket count that is not positive', () => {
    expect(() => new Directory({ buckets: 0 })).toThrow('Directory buckets must be positive')
  })
})
