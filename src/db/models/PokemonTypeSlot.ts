/**
 * PokemonTypeSlot Model - type membership with slot ordering
 */

import { Model } from '@nozbe/watermelondb'
import { field, text } from '@nozbe/watermelondb/decorators'

export default class PokemonTypeSlot extends Model {
  static table = 'pokemon_types'

  @text('pokemonId') pokemonId!: string
  @field('typeId') typeId!: number
  @field('slot') slot!: number
}
