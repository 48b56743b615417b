// Shared fixtures for the view model tests.

/** A promise the test opens by hand. */
export class Gate {
  private release: () => void = () => {};
  readonly opened = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  open(): void {
    this.release();
  }
}

/** Lets every pending microtask (and one timer turn) run. */
export const settle = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));
