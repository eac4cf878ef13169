import { afterEach, describe, it, expect, vi } from 'vitest'
import { GameController, GameSnapshot } from '../game_controller'

const EMPTY = ['', '', '', '', '', '', '', '', '']

/** Holds scheduled computer moves until the test releases them. */
function manualScheduler() {
  const tasks: Array<() => void> = []
  return {
    schedule: (task: () => void) => {
      tasks.push(task)
    },
    runNext: () => tasks.shift()?.(),
    get size() {
      return tasks.length
    },
  }
}

const immediate = (task: () => void) => task()

describe('GameController', () => {
  afterEach(() => {
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  it('answers a human move with one computer move', () => {
    const game = new GameController({ schedule: immediate })

    expect(game.applyHumanMove(0)).toBe(true)

    const snapshot = game.snapshot()
    expect(snapshot.board).toEqual(['X', '', '', '', 'O', '', '', '', ''])
    expect(snapshot.status).toBe('in_progress')
    expect(snapshot.pendingComputerMove).toBe(false)
  })

  it('rejects human input while the computer move is pending', () => {
    const scheduler = manualScheduler()
    const game = new GameController({ schedule: scheduler.schedule })

    expect(game.applyHumanMove(0)).toBe(true)
    expect(game.isComputerMovePending()).toBe(true)
    expect(game.applyHumanMove(1)).toBe(false)
    expect(game.snapshot().board).toEqual(['X', '', '', '', '', '', '', '', ''])

    scheduler.runNext()
    expect(game.isComputerMovePending()).toBe(false)
    expect(game.applyHumanMove(1)).toBe(true)
  })

  it('ignores occupied cells and indexes off the board', () => {
    const game = new GameController({ schedule: immediate })
    game.applyHumanMove(0)
    const before = game.snapshot()

    expect(game.applyHumanMove(0)).toBe(false)
    expect(game.applyHumanMove(4)).toBe(false)
    expect(game.applyHumanMove(9)).toBe(false)
    expect(game.applyHumanMove(-1)).toBe(false)
    expect(game.applyHumanMove(2.5)).toBe(false)
    expect(game.snapshot()).toEqual(before)
  })

  it('lets the computer win and then refuses further moves', () => {
    const game = new GameController({ strategy: 'priority', schedule: immediate })

    // O: 4, then 0 (blocks nothing, fallback), then completes the diagonal
    game.applyHumanMove(1)
    expect(game.snapshot().board).toEqual(['', 'X', '', '', 'O', '', '', '', ''])
    game.applyHumanMove(3)
    expect(game.snapshot().board).toEqual(['O', 'X', '', 'X', 'O', '', '', '', ''])
    game.applyHumanMove(5)

    const snapshot = game.snapshot()
    expect(snapshot.board).toEqual(['O', 'X', '', 'X', 'O', 'X', '', '', 'O'])
    expect(snapshot.status).toBe('computer_won')
    expect(snapshot.winningLine).toEqual([0, 4, 8])
    expect(snapshot.strategy).toBe('priority')
    expect(game.applyHumanMove(2)).toBe(false)
  })

  it('reports a human win', () => {
    const scheduler = manualScheduler()
    const game = new GameController({ strategy: 'exhaustive', schedule: scheduler.schedule })

    // X forks on 3 and 7 after the computer has taken the center and a corner
    game.applyHumanMove(0)
    scheduler.runNext() // O: 4
    game.applyHumanMove(8)
    scheduler.runNext() // O: 2
    game.applyHumanMove(6)
    scheduler.runNext() // O blocks 3
    expect(game.snapshot().board).toEqual(['X', '', 'O', 'O', 'O', '', 'X', '', 'X'])

    expect(game.applyHumanMove(7)).toBe(true)
    expect(game.getStatus()).toBe('human_won')
    expect(game.isComputerMovePending()).toBe(false)
    expect(scheduler.size).toBe(0)
  })

  it('classifies a full board with no line as a draw', () => {
    const game = new GameController({ strategy: 'exhaustive', schedule: immediate })

    for (const index of [4, 1, 6, 5, 8]) {
      game.applyHumanMove(index)
    }

    const snapshot = game.snapshot()
    expect(snapshot.board).toEqual(['O', 'X', 'O', 'O', 'X', 'X', 'X', 'O', 'X'])
    expect(snapshot.status).toBe('draw')
    expect(game.evaluateStatus()).toBe('draw')
  })

  it('uses a new strategy from the next computer move on', () => {
    const scheduler = manualScheduler()
    const game = new GameController({ strategy: 'exhaustive', schedule: scheduler.schedule })

    game.applyHumanMove(4)
    scheduler.runNext()
    expect(game.snapshot().strategy).toBe('exhaustive')

    game.setStrategy('heuristic')
    expect(game.getStrategy()).toBe('heuristic')
    expect(game.snapshot().strategy).toBe('exhaustive')

    game.applyHumanMove(8)
    scheduler.runNext()
    expect(game.snapshot().strategy).toBe('heuristic')
  })

  it('drops a computer move scheduled before a reset', () => {
    const scheduler = manualScheduler()
    const game = new GameController({ schedule: scheduler.schedule })

    game.applyHumanMove(0)
    game.newGame()
    scheduler.runNext()

    expect(game.snapshot().board).toEqual(EMPTY)
    expect(game.isComputerMovePending()).toBe(false)
  })

  it.each(['rematch', 'newGame'] as const)('%s twice leaves the same empty game as once', method => {
    const game = new GameController({ strategy: 'heuristic', schedule: immediate })
    game.applyHumanMove(0)
    game.applyHumanMove(8)

    game[method]()
    const once = game.snapshot()
    game[method]()

    expect(game.snapshot()).toEqual(once)
    expect(once).toEqual({
      board: EMPTY,
      status: 'in_progress',
      strategy: 'heuristic',
      winningLine: null,
      pendingComputerMove: false,
    })
  })

  it('keeps the strategy across a rematch', () => {
    const game = new GameController({ schedule: immediate })
    game.setStrategy('priority')
    game.rematch()
    expect(game.getStrategy()).toBe('priority')
  })

  it('ignores a computer move once the game is over', () => {
    const game = new GameController({ strategy: 'exhaustive', schedule: immediate })
    for (const index of [4, 1, 6, 5, 8]) {
      game.applyHumanMove(index)
    }
    const before = game.snapshot()

    game.applyComputerMove()
    expect(game.snapshot()).toEqual(before)
  })

  it('plays only one computer move when called while one is scheduled', () => {
    const scheduler = manualScheduler()
    const game = new GameController({ schedule: scheduler.schedule })

    game.applyHumanMove(0)
    game.applyComputerMove()
    scheduler.runNext()

    expect(game.snapshot().board).toEqual(['X', '', '', '', 'O', '', '', '', ''])
    expect(game.isComputerMovePending()).toBe(false)
  })

  it('does not let the computer move out of turn', () => {
    const game = new GameController({ schedule: immediate })

    game.applyComputerMove()
    expect(game.snapshot().board).toEqual(EMPTY)

    game.applyHumanMove(0)
    game.applyComputerMove()
    expect(game.snapshot().board).toEqual(['X', '', '', '', 'O', '', '', '', ''])
  })

  it('publishes a snapshot after every change', () => {
    const updates: GameSnapshot[] = []
    const game = new GameController({ schedule: immediate, onUpdate: snapshot => updates.push(snapshot) })

    game.applyHumanMove(0)
    game.rematch()

    expect(updates.map(update => update.board.filter(cell => cell !== '').length)).toEqual([1, 2, 0])
    expect(updates[0].pendingComputerMove).toBe(true)
    expect(updates[1].pendingComputerMove).toBe(false)
  })

  it('waits for the configured delay by default', () => {
    vi.useFakeTimers()
    const game = new GameController({ computerMoveDelayMs: 300 })

    game.applyHumanMove(0)
    vi.advanceTimersByTime(299)
    expect(game.snapshot().board[4]).toBe('')

    vi.advanceTimersByTime(1)
    expect(game.snapshot().board[4]).toBe('O')
  })

  it('runs independent games side by side', () => {
    const first = new GameController({ schedule: immediate })
    const second = new GameController({ schedule: immediate })

    first.applyHumanMove(0)

    expect(second.snapshot().board).toEqual(EMPTY)
  })
})
