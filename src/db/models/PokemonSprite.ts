import { Model } from '@nozbe/watermelondb'
import { field, text } from '@nozbe/watermelondb/decorators'

export default class PokemonSprite extends Model {
  static table = 'pokemon_sprites'

  @text('pokemonId') pokemonId!: string
  @field('frontDefault') frontDefault!: string | null
  @field('frontShiny') frontShiny!: string | null
  @field('backDefault') backDefault!: string | null
  @field('backShiny') backShiny!: string | null
  @field('officialArtworkDefault') officialArtworkDefault!: string | null
  @field('officialArtworkShiny') officialArtworkShiny!: string | null
}
