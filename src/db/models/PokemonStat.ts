import { Model } from '@nozbe/watermelondb'
import { field, text } from '@nozbe/watermelondb/decorators'

export default class PokemonStat extends Model {
  static table = 'pokemon_stats'

  @text('pokemonId') pokemonId!: string
  @text('statName') statName!: string
  @field('baseStat') baseStat!: number
  @field('effort') effort!: number
}
