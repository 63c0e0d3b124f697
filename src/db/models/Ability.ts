/**
 * Ability Model - catalogue entry, record id = ability id
 */

import { Model } from '@nozbe/watermelondb'
import { field, text } from '@nozbe/watermelondb/decorators'

export default class Ability extends Model {
  static table = 'abilities'

  @text('name') name!: string
  @field('shortEffect') shortEffect!: string | null
  @field('generation') generation!: number | null
  @field('isMainSeries') isMainSeries!: boolean
}
