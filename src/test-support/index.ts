/**
 * Test Support Module
 *
 * Scripted stand-ins for the interactive collaborators.
 */

import type { FileFilter } from '../documents'
import type { UserInterface } from '../ui/types'

export type ScriptedAnswer =
  | { readonly kind: 'file'; readonly path: string | null }
  | { readonly kind: 'text'; readonly text: string | null }
  | { readonly kind: 'yesNo'; readonly answer: boolean }

export type UICall =
  | { readonly method: 'chooseFile'; readonly title: string }
  | { readonly method: 'askText'; readonly title: string; readonly label: string }
  | { readonly method: 'askYesNo'; readonly title: string; readonly question: string }
  | { readonly method: 'notify'; readonly title: string; readonly message: string }
  | { readonly method: 'warn'; readonly title: string; readonly message: string }

export const answers = {
  file: (path: string | null): ScriptedAnswer => ({ kind: 'file', path }),
  text: (text: string | null): ScriptedAnswer => ({ kind: 'text', text }),
  yes: (): ScriptedAnswer => ({ kind: 'yesNo', answer: true }),
  no: (): ScriptedAnswer => ({ kind: 'yesNo', answer: false })
}

/**
 * Replays scripted answers in order and records every call.
 * Throws when asked something the script did not expect.
 */
export class ScriptedUI implements UserInterface {
  readonly calls: UICall[] = []
  private readonly script: ScriptedAnswer[]

  constructor(script: readonly ScriptedAnswer[] = []) {
    this.script = [...script]
  }

  get remaining(): number {
    return this.script.length
  }

  async chooseFile(title: string, _filter: FileFilter): Promise<string | null> {
    this.calls.push({ method: 'chooseFile', title })
    const next = this.next('file', title)
    return next.kind === 'file' ? next.path : null
  }

  async askText(title: string, label: string): Promise<string | null> {
    this.calls.push({ method: 'askText', title, label })
    const next = this.next('text', title)
    return next.kind === 'text' ? next.text : null
  }

  async askYesNo(title: string, question: string): Promise<boolean> {
    this.calls.push({ method: 'askYesNo', title, question })
    const next = this.next('yesNo', title)
    return next.kind === 'yesNo' ? next.answer : false
  }

  async notify(title: string, message: string): Promise<void> {
    this.calls.push({ method: 'notify', title, message })
  }

  async warn(title: string, message: string): Promise<void> {
    this.calls.push({ method: 'warn', title, message })
  }

  private next(kind: ScriptedAnswer['kind'], title: string): ScriptedAnswer {
    const answer = this.script.shift()
    if (!answer || answer.kind !== kind) {
      throw new Error(
        `ScriptedUI: script has "${answer?.kind ?? 'nothing'}" but was asked for "${kind}" (${title})`
      )
    }
    return answer
  }
}
