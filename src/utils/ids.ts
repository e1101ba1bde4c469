import { customAlphabet } from 'nanoid/non-secure'
import { ID_ALPHABET, ID_LENGTH } from '../constants'

const nanoid = customAlphabet(ID_ALPHABET, ID_LENGTH)

export function newId(prefix?: string): string {
  return prefix ? `${prefix}_${nanoid()}` : nanoid()
}
