/** Human-readable name, for debug UIs and lookups from scripts. */
export class TagComponent {
  constructor(public name = "") {}
}
