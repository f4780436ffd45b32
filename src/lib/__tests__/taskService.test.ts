import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals'
import type { CreateTaskDTO } from '@/types'
import { NotFoundError, TaskNotFoundError, ValidationError } from '@/lib/errors'
import { ReferenceDataService } from '@/lib/referenceDataService'
import { decodePayload } from '@/lib/sync/mutationQueue'
import { TaskService } from '@/lib/taskService'
import { at } from './support/clock'
import { Harness, createHarness, makeTask } from './support/harness'

describe('TaskService', () => {
  let h: Harness
  let onLocalChange: jest.Mock<() => void>
  let taskService: TaskService

  const taskData: CreateTaskDTO = {
    title: '  Stretch  ',
    task_type: 'one_time',
    reminder_time: '2025-01-10T18:00:00',
    assigned_user_ids: [2, 2, 1],
  }

  beforeEach(async () => {
    h = await createHarness('tasks')
    onLocalChange = jest.fn<() => void>()
    taskService = new TaskService({ cache: h.cache, queue: h.queue, clock: h.clock, settings: h.settings, onLocalChange })
  })

  afterEach(() => {
    h.db.close()
  })

  describe('createTask', () => {
    it('should cache and queue the task under a pending id', async () => {
      const task = await taskService.createTask(taskData)

      expect(task).toEqual({
        id: -1,
        title: 'Stretch',
        description: null,
        task_type: 'one_time',
        recurrence_type: null,
        recurrence_interval: null,
        interval_days: null,
        reminder_time: '2025-01-10T18:00:00',
        group_id: null,
        enabled: true,
        completed: false,
        assigned_user_ids: [2, 1],
        created_at: at('2025-01-10T12:00'),
        updated_at: at('2025-01-10T12:00'),
        last_accessed: at('2025-01-10T12:00'),
        last_shown_at: null,
      })
      expect(await h.cache.get('task', -1)).toEqual(task)

      const [item] = await h.queue.list()
      expect(item).toMatchObject({ operation: 'create', entity_type: 'task', entity_id: -1 })
      expect(decodePayload(item.payload)).toMatchObject({ id: -1, title: 'Stretch' })
      expect(decodePayload(item.payload)).not.toHaveProperty('last_accessed')
      expect(onLocalChange).toHaveBeenCalledTimes(1)
    })

    it('should hand out a new pending id for each task', async () => {
      await taskService.createTask(taskData)
      const second = await taskService.createTask(taskData)

      expect(second.id).toBe(-2)
    })

    it('should reject invalid task data without queueing', async () => {
      await expect(taskService.createTask({ ...taskData, title: '   ' })).rejects.toBeInstanceOf(ValidationError)

      expect(await h.queue.list()).toEqual([])
      expect(onLocalChange).not.toHaveBeenCalled()
    })

    it('should reject a fractional recurrence interval without queueing', async () => {
      const recurring: CreateTaskDTO = { ...taskData, task_type: 'recurring', recurrence_type: 'daily', recurrence_interval: 1.5 }

      await expect(taskService.createTask(recurring)).rejects.toBeInstanceOf(ValidationError)

      expect(await h.queue.list()).toEqual([])
      expect(await h.cache.listByType('task')).toEqual([])
    })

    it('should reject fractional user ids without queueing', async () => {
      await expect(taskService.createTask({ ...taskData, assigned_user_ids: [1.5] })).rejects.toBeInstanceOf(ValidationError)

      expect(await h.queue.list()).toEqual([])
    })
  })

  describe('updateTask', () => {
    beforeEach(async () => {
      await h.cache.upsert('task', [makeTask({ id: 1 })])
    })

    it('should merge the changes and stamp updated_at', async () => {
      h.clock.advance(1000)

      const updated = await taskService.updateTask(1, { title: 'Repot plants', group_id: 3 })

      expect(updated).toMatchObject({
        title: 'Repot plants',
        group_id: 3,
        reminder_time: '2025-01-10T10:00:00',
        updated_at: at('2025-01-10T12:00') + 1000,
      })
      expect(await h.cache.get('task', 1)).toEqual(updated)
      expect((await h.queue.list()).map(item => `${item.operation}#${item.entity_id}`)).toEqual(['update#1'])
    })

    it('should throw for an unknown task', async () => {
      await expect(taskService.updateTask(42, { title: 'X' })).rejects.toBeInstanceOf(TaskNotFoundError)
    })

    it('should reject an invalid result and keep the cached task', async () => {
      await expect(taskService.updateTask(1, { reminder_time: 'tomorrow' })).rejects.toBeInstanceOf(ValidationError)

      expect((await h.cache.get('task', 1))?.reminder_time).toBe('2025-01-10T10:00:00')
    })

    it('should reject a fractional group id and keep the cached task', async () => {
      await expect(taskService.updateTask(1, { group_id: 2.5 })).rejects.toBeInstanceOf(ValidationError)

      expect((await h.cache.get('task', 1))?.group_id).toBeNull()
      expect(await h.queue.list()).toEqual([])
    })

    it('should refuse edits once a delete is pending', async () => {
      await taskService.deleteTask(1)

      await expect(taskService.updateTask(1, { title: 'X' })).rejects.toBeInstanceOf(ValidationError)
    })
  })

  describe('completeTask', () => {
    beforeEach(async () => {
      await h.cache.upsert('task', [makeTask({ id: 1 })])
    })

    it('should queue a light completion', async () => {
      const task = await taskService.completeTask(1)

      expect(task.completed).toBe(true)
      const [item] = await h.queue.list()
      expect(item.operation).toBe('complete')
      expect(decodePayload(item.payload)).toEqual({ completed: true, updated_at: at('2025-01-10T12:00') })
    })

    it('should do nothing when already completed', async () => {
      await taskService.completeTask(1)
      await taskService.completeTask(1)

      expect(await h.queue.list()).toHaveLength(1)
      expect(onLocalChange).toHaveBeenCalledTimes(1)
    })

    it('should replace an unsent completion when undone', async () => {
      await taskService.completeTask(1)

      const task = await taskService.uncompleteTask(1)

      expect(task.completed).toBe(false)
      expect((await h.queue.list()).map(item => item.operation)).toEqual(['uncomplete'])
    })
  })

  describe('deleteTask', () => {
    it('should disable a confirmed task until the delete is sent', async () => {
      await h.cache.upsert('task', [makeTask({ id: 1 })])

      await taskService.deleteTask(1)

      expect(await h.cache.get('task', 1)).toMatchObject({ enabled: false, updated_at: at('2025-01-10T12:00') })
      expect((await h.queue.list()).map(item => item.operation)).toEqual(['delete'])
    })

    it('should drop a task that was never sent', async () => {
      const task = await taskService.createTask(taskData)

      await taskService.deleteTask(task.id)

      expect(await h.cache.get('task', task.id)).toBeNull()
      expect(await h.queue.list()).toEqual([])
    })

    it('should throw for an unknown task', async () => {
      await expect(taskService.deleteTask(42)).rejects.toBeInstanceOf(TaskNotFoundError)
    })
  })

  describe('reads', () => {
    beforeEach(async () => {
      await h.cache.upsert('task', [
        makeTask({ id: 1, group_id: 2, assigned_user_ids: [1] }),
        makeTask({ id: 2, assigned_user_ids: [2], completed: true, reminder_time: '2025-01-12T10:00:00' }),
        makeTask({ id: 3, enabled: false, reminder_time: '2025-01-09T10:00:00' }),
      ])
    })

    it('should record access when reading one task', async () => {
      const task = await taskService.getTask(1)

      expect(task.last_accessed).toBe(at('2025-01-01T09:00'))
      expect((await h.cache.get('task', 1))?.last_accessed).toBe(at('2025-01-10T12:00'))
    })

    it('should filter cached tasks', async () => {
      const ids = async (filter: Parameters<TaskService['getTasks']>[0]) =>
        (await taskService.getTasks(filter)).map(task => task.id)

      expect(await ids({})).toEqual([1, 2, 3])
      expect(await ids({ group_id: 2 })).toEqual([1])
      expect(await ids({ assigned_user_id: 2 })).toEqual([2])
      expect(await ids({ completed: true })).toEqual([2])
      expect(await ids({ enabled: false })).toEqual([3])
      expect(await ids({ reminder_from: '2025-01-10T00:00', reminder_to: '2025-01-11T00:00' })).toEqual([1])
    })

    it('should list today tasks, optionally for one user', async () => {
      expect((await taskService.getTodayTasks()).map(task => task.id)).toEqual([3, 1])
      expect((await taskService.getTodayTasks(2)).map(task => task.id)).toEqual([3])
    })
  })
})

describe('ReferenceDataService', () => {
  let h: Harness
  let referenceData: ReferenceDataService

  beforeEach(async () => {
    h = await createHarness('reference')
    referenceData = new ReferenceDataService({ cache: h.cache, queue: h.queue, clock: h.clock })
    await h.cache.upsert('user', [{ id: 1, name: 'Ann', updated_at: 1 }])
    await h.cache.upsert('group', [{ id: 3, name: 'Home', user_ids: [1], updated_at: 1 }])
  })

  afterEach(() => {
    h.db.close()
  })

  it('should list cached users and groups', async () => {
    expect((await referenceData.getUsers()).map(user => user.name)).toEqual(['Ann'])
    expect((await referenceData.getGroups()).map(group => group.name)).toEqual(['Home'])
  })

  it('should rename a user and queue the update', async () => {
    const user = await referenceData.updateUser(1, { name: ' Anna ' })

    expect(user).toMatchObject({ id: 1, name: 'Anna', updated_at: at('2025-01-10T12:00') })
    expect((await h.queue.list()).map(item => `${item.operation}:${item.entity_type}#${item.entity_id}`)).toEqual([
      'update:user#1',
    ])
  })

  it('should reject unknown users and empty names', async () => {
    await expect(referenceData.updateUser(9, { name: 'Bo' })).rejects.toBeInstanceOf(NotFoundError)
    await expect(referenceData.updateUser(1, { name: ' ' })).rejects.toBeInstanceOf(ValidationError)
  })

  it('should create a group under a pending id', async () => {
    const group = await referenceData.createGroup({ name: 'Garden', user_ids: [1, 1] })

    expect(group).toEqual({
      id: -1,
      name: 'Garden',
      description: null,
      created_by: null,
      user_ids: [1],
      updated_at: at('2025-01-10T12:00'),
      last_accessed: at('2025-01-10T12:00'),
    })
    expect((await h.queue.list()).map(item => item.operation)).toEqual(['create'])
  })

  it('should reject a group with fractional user ids without queueing', async () => {
    await expect(referenceData.createGroup({ name: 'Garden', user_ids: [1.5] })).rejects.toBeInstanceOf(ValidationError)
    await expect(referenceData.updateGroup(3, { user_ids: [2.5] })).rejects.toBeInstanceOf(ValidationError)

    expect(await h.queue.list()).toEqual([])
    expect((await h.cache.get('group', 3))?.user_ids).toEqual([1])
  })

  it('should update a group', async () => {
    const group = await referenceData.updateGroup(3, { user_ids: [1, 2] })

    expect(group).toMatchObject({ name: 'Home', user_ids: [1, 2] })
  })

  it('should remove a deleted group from the cache at once', async () => {
    await referenceData.deleteGroup(3)

    expect(await h.cache.get('group', 3)).toBeNull()
    expect((await h.queue.list()).map(item => item.operation)).toEqual(['delete'])
  })

  it('should cancel an unsent group create on delete', async () => {
    const group = await referenceData.createGroup({ name: 'Garden' })

    await referenceData.deleteGroup(group.id)

    expect(await h.queue.list()).toEqual([])
    await expect(referenceData.deleteGroup(group.id)).rejects.toBeInstanceOf(NotFoundError)
  })
})
