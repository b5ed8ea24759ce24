/* eslint-disable no-console */
import { createInterface } from 'node:readline/promises'

export interface Prompter {
  /** Next answer, or null once input has ended. */
  ask(question: string): Promise<string | null>
  close(): void
}

export interface Output {
  out(line: string): void
  err(line: string): void
}

export const consoleOutput: Output = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
}

export function terminalPrompter(): Prompter {
  const rl = createInterface({ input: process.stdin, output: process.stdout })
  let ended = false
  const closed = new Promise<null>((resolve) => {
    rl.once('close', () => {
      ended = true
      resolve(null)
    })
  })
  return {
    ask(question) {
      if (ended) return Promise.resolve(null)
      // a pending question rejects once stdin closes; that is end of input
      const answer = rl.question(question).catch((err: unknown) => {
        if (ended) return null
        throw err
      })
      return Promise.race([answer, closed])
    },
    close() {
      rl.close()
    },
  }
}

/** Feeds fixed answers in order, then reports end of input. */
export function scriptedPrompter(answers: readonly string[]): Prompter & { asked: string[] } {
  const queue = answers.slice()
  const asked: string[] = []
  return {
    asked,
    async ask(question) {
      asked.push(question)
      return queue.shift() ?? null
    },
    close() {
      queue.length = 0
    },
  }
}
