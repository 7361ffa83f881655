/**
 * SceneManager -- runs one scene at a time and follows the transitions
 * they ask for.
 *
 * A scene runs until it hands back the key of the next scene, or
 * `null` to end the app.
 */

export interface Scene {
  /** Unique key other scenes use to switch to this one. */
  readonly key: string;
  /** Run the scene; resolves the next scene's key, or `null` to quit. */
  run(): Promise<string | null>;
}

export class SceneManager {
  private readonly scenes = new Map<string, Scene>();

  /**
   * @throws If a scene with the same key is already registered.
   */
  register(scene: Scene): void {
    if (this.scenes.has(scene.key)) {
      throw new Error(`Scene '${scene.key}' is already registered`);
    }
    this.scenes.set(scene.key, scene);
  }

  has(key: string): boolean {
    return this.scenes.has(key);
  }

  /**
   * Run scenes starting from `key` until one returns `null`.
   *
   * @throws If a scene asks for a key that is not registered.
   */
  async start(key: string): Promise<void> {
    let next: string | null = key;
    while (next !== null) {
      const scene = this.scenes.get(next);
      if (!scene) {
        throw new Error(`Unknown scene '${next}'`);
      }
      console.log(`[SceneManager] Starting ${scene.key}`);
      next = await scene.run();
    }
  }
}
