/**
 * Source port interface.
 * Turns a module-relative script path into source text.
 */
export interface ScriptSource {
  /**
   * Fetch a script.
   * Implementations MUST refuse paths that escape the module's root.
   * @returns Source text, or undefined when there is no such script
   */
  fetch(moduleId: string, relativePath: string): string | undefined;

  /**
   * Last modification stamp of a script, used by the reload watcher.
   * Sources that cannot tell simply omit this.
   */
  modifiedTime?(moduleId: string, relativePath: string): number | undefined;
}
