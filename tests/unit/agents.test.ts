import { describe, it, expect, vi } from 'vitest'
import { AgentPool, ACTION_TYPES, RandomAgent, ReplayAgent } from '../../src/agents'
import { InMemoryEpisode } from '../../src/episode'
import { IndexOutOfRangeError, KeyMismatchError, NotFoundError } from '../../src/errors'
import { KEYBOARD_KEYS, MOUSE_BUTTONS } from '../../src/keys'
import type { Action, Agent } from '../../src/types'
import { makeStep } from '../fixtures/helpers'

class EchoAgent implements Agent<number, string> {
  readonly rewards: number[] = []
  resets = 0

  constructor(readonly id: string) {}

  reset(): void {
    this.resets++
  }

  act(observation: number): string {
    return `${this.id}:${observation}`
  }

  update(reward: number): void {
    this.rewards.push(reward)
  }
}

function echoPool(ids: string[] = ['0', '1'], parallel = false) {
  const agents = new Map<string, EchoAgent>()
  const pool = new AgentPool<number, string>(
    (id) => {
      const agent = new EchoAgent(id)
      agents.set(id, agent)
      return agent
    },
    ids,
    { parallel }
  )
  return { pool, agents }
}

describe('AgentPool', () => {
  it('should create one agent per initial id', () => {
    const { pool } = echoPool()
    expect(pool.ids).toEqual(['0', '1'])
    expect(pool.size).toBe(2)
  })

  it('should assign the next free numeric id on add', () => {
    const { pool } = echoPool()
    expect(pool.addAgent()).toBe('2')
    expect(pool.addAgent()).toBe('3')
    expect(pool.ids).toEqual(['0', '1', '2', '3'])
  })

  it('should skip past named ids when numbering', () => {
    const { pool } = echoPool(['left', '7'])
    expect(pool.addAgent()).toBe('8')
    const empty = echoPool([]).pool
    expect(empty.addAgent()).toBe('0')
  })

  it('should dispatch observations and rewards by key', async () => {
    const { pool, agents } = echoPool()
    expect(await pool.act({ '0': 10, '1': 20 })).toEqual({ '0': '0:10', '1': '1:20' })

    await pool.update({ '1': 0.5, '0': -1 })
    expect(agents.get('0')?.rewards).toEqual([-1])
    expect(agents.get('1')?.rewards).toEqual([0.5])
  })

  it('should reset every agent', async () => {
    const { pool, agents } = echoPool()
    await pool.reset()
    expect([...agents.values()].map((agent) => agent.resets)).toEqual([1, 1])
  })

  it('should reject mismatched keys before calling any agent', async () => {
    const { pool, agents } = echoPool()
    const act = vi.spyOn(agents.get('0') ?? new EchoAgent('x'), 'act')

    await expect(pool.act({ '0': 1 })).rejects.toThrow(KeyMismatchError)
    await expect(pool.act({ '0': 1, '1': 2, '2': 3 })).rejects.toThrow(
      "Observation keys [0, 1, 2] don't match agent keys [0, 1]"
    )
    await expect(pool.update({ '0': 1, x: 2 })).rejects.toThrow("Reward keys [0, x] don't match agent keys [0, 1]")
    expect(act).not.toHaveBeenCalled()
    expect(agents.get('0')?.rewards).toEqual([])
  })

  it('should raise NotFoundError for an unknown agent id', () => {
    const { pool } = echoPool()
    expect(() => pool.getAgent('9')).toThrow(NotFoundError)
    expect(() => pool.getAgent('9')).toThrow('No agent found with ID: 9')
  })

  it('should produce the same actions in parallel mode', async () => {
    const { pool } = echoPool(['0', '1', '2'], true)
    expect(await pool.act({ '0': 1, '1': 2, '2': 3 })).toEqual({ '0': '0:1', '1': '1:2', '2': '2:3' })
  })
})

describe('RandomAgent', () => {
  function sequence(values: number[]): () => number {
    let i = 0
    return () => values[i++ % values.length]
  }

  it('should only produce the requested action types', () => {
    const agent = new RandomAgent({ actionTypes: ['mouse_move'], screenWidth: 100, screenHeight: 50 })
    for (let i = 0; i < 20; i++) {
      const action = agent.act()
      expect(action.type).toBe('mouse_move')
      if (action.type === 'mouse_move') {
        expect(action.x).toBeGreaterThanOrEqual(0)
        expect(action.x).toBeLessThan(100)
        expect(action.y).toBeLessThan(50)
      }
    }
  })

  it('should draw every field from the random source', () => {
    // type index 6 of 7 -> mouse_scroll; delta floor(0.5 * 7) - 3 = 0
    const scroll = new RandomAgent({ rng: sequence([0.9, 0.5]) })
    expect(scroll.act()).toEqual({ type: 'mouse_scroll', delta: 0 })

    // first type -> key_down; first key
    const key = new RandomAgent({ rng: sequence([0]) })
    expect(key.act()).toEqual({ type: 'key_down', key: KEYBOARD_KEYS[0] })

    const button = new RandomAgent({ rng: sequence([0.99]), actionTypes: ['mouse_button_up'] })
    expect(button.act()).toEqual({ type: 'mouse_button_up', button: MOUSE_BUTTONS[MOUSE_BUTTONS.length - 1] })
  })

  it('should type between one and eight characters', () => {
    const agent = new RandomAgent({ actionTypes: ['type_text'] })
    for (let i = 0; i < 20; i++) {
      const action = agent.act()
      if (action.type !== 'type_text') throw new Error(`unexpected ${action.type}`)
      expect(action.text.length).toBeGreaterThanOrEqual(1)
      expect(action.text.length).toBeLessThanOrEqual(8)
    }
  })

  it('should accumulate rewards until reset', () => {
    const agent = new RandomAgent()
    agent.update(1.5)
    agent.update(2)
    expect(agent.totalReward).toBe(3.5)
    agent.reset()
    expect(agent.totalReward).toBe(0)
  })

  it('should cover all seven canonical action types by default', () => {
    expect(ACTION_TYPES).toHaveLength(7)
  })
})

describe('ReplayAgent', () => {
  const recorded: Action[] = [
    { type: 'type_text', text: 'a' },
    { type: 'mouse_scroll', delta: 1 },
  ]

  it('should replay actions in order and rewind on reset', () => {
    const agent = new ReplayAgent(recorded)
    expect(agent.act()).toEqual(recorded[0])
    expect(agent.remaining).toBe(1)
    expect(agent.act()).toEqual(recorded[1])
    agent.reset()
    expect(agent.act()).toEqual(recorded[0])
  })

  it('should repeat the fallback once exhausted', () => {
    const idle: Action = { type: 'mouse_scroll', delta: 0 }
    const agent = new ReplayAgent(recorded, idle)
    agent.act()
    agent.act()
    expect(agent.act()).toBe(idle)
    expect(agent.act()).toBe(idle)
  })

  it('should raise IndexOutOfRangeError when exhausted without a fallback', () => {
    const agent = new ReplayAgent(recorded)
    agent.act()
    agent.act()
    expect(() => agent.act()).toThrow(IndexOutOfRangeError)
    expect(() => agent.act()).toThrow('replay action index 2 out of range (size 2)')
  })

  it('should load the actions of a recorded episode', async () => {
    const episode = new InMemoryEpisode()
    await episode.push(makeStep(1))
    await episode.push(makeStep(2))

    const agent = await ReplayAgent.fromEpisode(episode)
    expect(agent.remaining).toBe(2)
    expect(agent.act()).toEqual({ type: 'type_text', text: 'step 1' })
    expect(agent.act()).toEqual({ type: 'type_text', text: 'step 2' })
  })
})
