/**
 * Base class for operation inputs.
 *
 * An Input is a mutable bag of fields. Nothing is validated until
 * `request()` is called, so a partially filled Input is a valid
 * intermediate value.
 */

import type { Request } from './request.js';

/** Options every Input accepts next to its own fields. */
export interface InputOptions {
  /** Region for this call only, overriding the client's region. */
  region?: string | null | undefined;
}

export abstract class Input {
  region: string | undefined;

  protected constructor(input: InputOptions) {
    this.region = input.region ?? undefined;
  }

  /**
   * Project the current fields onto a transport request.
   * @throws MissingRequiredFieldError when a required field is unset.
   * @throws InvalidEnumValueError when an enum field holds an unknown value.
   */
  abstract request(): Request;
}
