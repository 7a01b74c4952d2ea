/** One `<members>` entry paired with the `<name>` of its `<types>` block. */
export interface Component {
  readonly typeName: string;
  readonly memberName: string;
}

export type ComponentList = readonly Component[];

export interface Manifest {
  /** Components in document order: type blocks first-to-last, members within each block. */
  components: ComponentList;
  /** Text of the root `<version>` element; informational only. */
  version?: string;
  /** Default namespace declared on the root element, if any. */
  namespace?: string;
  /** Advisory findings about the document shape that did not stop parsing. */
  warnings: string[];
}
