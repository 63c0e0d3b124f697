/**
 * Filter Session
 *
 * State behind a filter screen: the criteria being edited and a live,
 * debounced count of how many Pokémon they match.
 */

import {
  BehaviorSubject,
  Observable,
  catchError,
  debounceTime,
  distinctUntilChanged,
  filter,
  from,
  map,
  of,
  switchMap,
} from 'rxjs';
import { settingsHelpers } from '../../stores/settingsStore';
import type { FilterCriteria, FilterCriteriaInput, TypeFilterLogic } from '../schemas/filter';
import type { PokemonTypeName } from '../schemas/pokemon';
import type { FilterEngine } from './filterEngine';
import { parseCriteria } from './filterEngine';
import { createLogger } from '../utils/logger';

const logger = createLogger('FilterSession');

export interface FilterSessionOptions {
  initialCriteria?: FilterCriteriaInput;
  /** Defaults to settings.filter.countDebounceMs */
  countDebounceMs?: number;
}

export interface MatchCountState {
  count: number;
  isLoading: boolean;
}

function toggle<T>(values: T[], value: T): T[] {
  return values.includes(value) ? values.filter((v) => v !== value) : [...values, value];
}

export class FilterSession {
  private engine: FilterEngine;
  private subject: BehaviorSubject<FilterCriteria>;
  private debounceMs: number;

  readonly criteria$: Observable<FilterCriteria>;

  /**
   * Count for the latest criteria. Edits inside the debounce window collapse
   * into one count; a newer edit cancels a pending one. A failed count is
   * logged and reported as 0.
   */
  readonly matchCount$: Observable<number>;

  /** matchCount$ with a loading flag raised while a count is in flight */
  readonly matchCountState$: Observable<MatchCountState>;

  constructor(engine: FilterEngine, options: FilterSessionOptions = {}) {
    this.engine = engine;
    this.subject = new BehaviorSubject(parseCriteria(options.initialCriteria));
    this.debounceMs = options.countDebounceMs ?? settingsHelpers.getSettings().filter.countDebounceMs;

    this.criteria$ = this.subject.asObservable();

    this.matchCountState$ = this.criteria$.pipe(
      debounceTime(this.debounceMs),
      switchMap((criteria) => {
        const counted = from(this.engine.countPokemon(criteria)).pipe(
          map((count): MatchCountState => ({ count, isLoading: false })),
          catchError((error: unknown) => {
            logger.error('Failed to count filtered Pokémon', error);
            return of<MatchCountState>({ count: 0, isLoading: false });
          }),
        );
        return new Observable<MatchCountState>((subscriber) => {
          subscriber.next({ count: 0, isLoading: true });
          return counted.subscribe(subscriber);
        });
      }),
    );

    this.matchCount$ = this.matchCountState$.pipe(
      filter((state) => !state.isLoading),
      map((state) => state.count),
      distinctUntilChanged(),
    );
  }

  get criteria(): FilterCriteria {
    return this.subject.value;
  }

  toggleType(type: PokemonTypeName): void {
    this.update({ types: toggle(this.criteria.types, type) });
  }

  toggleGeneration(generation: number): void {
    this.update({ generations: toggle(this.criteria.generations, generation) });
  }

  setTypeLogic(typeLogic: TypeFilterLogic): void {
    this.update({ typeLogic });
  }

  /**
   * Merge a partial change into the current criteria. Throws
   * InvalidCriteriaError and keeps the old criteria when the result is invalid.
   */
  update(patch: FilterCriteriaInput): void {
    this.subject.next(parseCriteria({ ...this.criteria, ...patch }));
  }

  reset(): void {
    this.subject.next(parseCriteria({}));
  }

  dispose(): void {
    this.subject.complete();
  }
}
