import { describe, it, expect } from 'vitest'
import { PendingTasks } from '../src/tasks'

describe('PendingTasks', () => {
  it('should forget tasks once they settle', async () => {
    const tasks = new PendingTasks()

    tasks.add(Promise.resolve(1))
    expect(tasks.size).toBe(1)
    await tasks.settled()

    expect(tasks.size).toBe(0)
  })

  it('should wait for tasks added while waiting', async () => {
    const tasks = new PendingTasks()
    const order: string[] = []
    tasks.add(Promise.resolve().then(() => {
      order.push('first')
      tasks.add(Promise.resolve().then(() => {
        order.push('second')
      }))
    }))

    await tasks.settled()

    expect(order).toEqual(['first', 'second'])
    expect(tasks.size).toBe(0)
  })

  it('should reject with the error of a failed task', async () => {
    const tasks = new PendingTasks()

    tasks.add(Promise.reject(new Error('failed')))

    await expect(tasks.settled()).rejects.toThrow('failed')
    expect(tasks.size).toBe(0)
  })

  it('should keep a failure that settles before anyone waits', async () => {
    const tasks = new PendingTasks()

    tasks.add(Promise.reject(new Error('late')))
    await new Promise(resolve => setTimeout(resolve, 0))

    expect(tasks.size).toBe(0)
    await expect(tasks.settled()).rejects.toThrow('late')
    await expect(tasks.settled()).resolves.toBeUndefined()
  })
})
