/**
 * PokemonAbility Model - links a Pokémon to an ability catalogue entry
 */

import { Model } from '@nozbe/watermelondb'
import { field, text } from '@nozbe/watermelondb/decorators'

export default class PokemonAbility extends Model {
  static table = 'pokemon_abilities'

  @text('pokemonId') pokemonId!: string
  @text('abilityId') abilityId!: string
  @field('slot') slot!: number
  @field('isHidden') isHidden!: boolean
}
