/**
 * User Interaction Surface
 *
 * Every call resolves only once the user has responded.
 */

import type { FileFilter } from '../documents'

export interface UserInterface {
  /** Pick a file. Resolves null when the user cancels. */
  chooseFile(title: string, filter: FileFilter): Promise<string | null>
  /** Free-text entry. Resolves null (or '') when the user cancels. */
  askText(title: string, label: string): Promise<string | null>
  askYesNo(title: string, question: string): Promise<boolean>
  notify(title: string, message: string): Promise<void>
  warn(title: string, message: string): Promise<void>
}
