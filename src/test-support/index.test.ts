import { describe, expect, it } from 'vitest'
import { DOCUMENT_FILTER } from '../documents'
import { answers, ScriptedUI } from './index'

describe('ScriptedUI', () => {
  it('replays answers in order and records calls', async () => {
    const ui = new ScriptedUI([answers.yes(), answers.text('role')])

    expect(await ui.askYesNo('Resume', 'Use it?')).toBe(true)
    expect(await ui.askText('Job description', 'Enter:')).toBe('role')
    expect(ui.calls.map((c) => c.method)).toEqual(['askYesNo', 'askText'])
    expect(ui.remaining).toBe(0)
  })

  it('names the scripted kind and the requested kind on a mismatch', async () => {
    const ui = new ScriptedUI([answers.text('role')])

    await expect(ui.chooseFile('Resume', DOCUMENT_FILTER)).rejects.toThrow(
      'ScriptedUI: script has "text" but was asked for "file" (Resume)'
    )
  })

  it('reports an exhausted script', async () => {
    const ui = new ScriptedUI()

    await expect(ui.askYesNo('Resume', 'Use it?')).rejects.toThrow(
      'ScriptedUI: script has "nothing" but was asked for "yesNo" (Resume)'
    )
  })
})
