/**
 * Pokemon Model
 *
 * Record id is the national dex number as a string.
 */

import { Model } from '@nozbe/watermelondb'
import { field, text } from '@nozbe/watermelondb/decorators'

export default class Pokemon extends Model {
  static table = 'pokemon'

  @text('name') name!: string
  @field('height') height!: number  // decimetres
  @field('weight') weight!: number  // hectograms
  @field('baseExperience') baseExperience!: number | null
  @field('orderIndex') orderIndex!: number
  @field('isDefault') isDefault!: boolean
  @field('generation') generation!: number | null
  @field('isLegendary') isLegendary!: boolean
  @field('isMythical') isMythical!: boolean
  @field('isBaby') isBaby!: boolean

  get dexNumber(): number {
    return Number(this.id)
  }
}
