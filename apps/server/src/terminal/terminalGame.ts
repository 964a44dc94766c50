import { Move, MOVE_NAMES, RoundOutcome } from '../engine/index.js'
import { MatchService, MatchState } from '../services/matchService.js'

export interface TerminalIO {
  ask(question: string): Promise<string>
  print(line: string): void
}

export const MOVE_PROMPT = 'Choose your move: 1-rock 2-paper 3-scissors: '

const ROUND_MESSAGES: Record<RoundOutcome, string> = {
  tie: 'It\'s a tie!',
  win: 'You won!',
  loss: 'You lost!',
}

/** Maps the keys 1/2/3 to rock/paper/scissors; anything else is rejected. */
export function parseMoveInput(input: string): Move | null {
  switch (input.trim()) {
    case '1':
      return 0
    case '2':
      return 1
    case '3':
      return 2
    default:
      return null
  }
}

export function bannerLines(maxRounds: number, scoreLimit: number): string[] {
  return [
    'Welcome to classic "ROCK-PAPER-SCISSORS" game',
    `You are going to play ${maxRounds} rounds vs computer`,
    'Score is now set to 0. Win: +1, Loss: -1, Tie: 0',
    `If score hits ${scoreLimit} - you win, if -${scoreLimit} - you lose`,
  ]
}

export function finalMessage(score: number): string {
  if (score === 0) return 'It\'s a tie!'
  return score > 0 ? 'You won! Congratulations' : 'You lost! Better luck next time!'
}

async function readMove(io: TerminalIO): Promise<Move> {
  for (;;) {
    const move = parseMoveInput(await io.ask(MOVE_PROMPT))
    if (move !== null) return move
    io.print('Wrong choice!')
  }
}

/**
 * Plays one full match against the engine over a line-based terminal and
 * returns the final match state.
 */
export async function runTerminalGame(io: TerminalIO, matchService: MatchService): Promise<MatchState> {
  const { maxRounds, scoreLimit } = matchService.getLimits()
  const playerId = 'terminal'
  const match = matchService.createMatch(playerId)

  for (const line of bannerLines(maxRounds, scoreLimit)) {
    io.print(line)
  }

  let selection = 0
  try {
    while (match.status === 'active') {
      io.print(`-----Round: ${match.round} Score: ${match.score}-----`)
      const move = await readMove(io)

      const result = await matchService.throwMove({
        matchId: match.id,
        playerId,
        move,
        selectionId: String(selection++),
      })
      if (!result.success || !result.round) {
        throw new Error(`Round rejected: ${result.reason ?? 'unknown'}`)
      }

      io.print(`You: ${MOVE_NAMES[result.round.playerMove]} vs Computer: ${MOVE_NAMES[result.round.computerMove]}`)
      io.print(ROUND_MESSAGES[result.round.outcome])
    }

    io.print('-----GAME OVER!-----')
    io.print(finalMessage(match.score))
    return { ...match }
  } finally {
    matchService.cleanupMatch(match.id)
  }
}
