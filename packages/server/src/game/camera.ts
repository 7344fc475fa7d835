// camera.ts
// Summary: Follow camera for the render collaborator: eases towards the pilot, applies decaying shake,
//          and maps pointer coordinates from screen space to world space.
// Structure: Camera class with update/shake/toWorld.
// Usage: camera.update(player.position, dt); aimPlayerAt(player, camera.toWorld(pointer));
// ---------------------------------------------------------------------------

import type { Vec2 } from '@wingmaze/shared';

interface Extent {
  readonly width: number;
  readonly height: number;
}

const FOLLOW_EASING = 0.1;
const SHAKE_DECAY_PER_SECOND = 10;

export class Camera {
  private offsetX = 0;
  private offsetY = 0;
  private shakeTimer = 0;
  private shakeIntensity = 0;

  constructor(
    private readonly viewport: Extent,
    private readonly world: Extent,
    private readonly jitter: () => number = Math.random
  ) {}

  get offset(): Vec2 {
    return { x: this.offsetX, y: this.offsetY };
  }

  shake(intensity: number, duration: number): void {
    this.shakeTimer = duration;
    this.shakeIntensity = intensity;
  }

  update(target: Vec2 | null, dt: number): void {
    if (this.shakeTimer > 0) {
      this.shakeTimer -= dt;
      this.shakeIntensity = Math.max(0, this.shakeIntensity - dt * SHAKE_DECAY_PER_SECOND);
    } else {
      this.shakeIntensity = 0;
    }
    if (!target) return;

    let targetX = target.x - this.viewport.width / 2;
    let targetY = target.y - this.viewport.height / 2;
    if (this.shakeIntensity > 0) {
      targetX += (this.jitter() * 2 - 1) * this.shakeIntensity;
      targetY += (this.jitter() * 2 - 1) * this.shakeIntensity;
    }
    // Scroll range spans twice the field extent.
    targetX = Math.max(0, Math.min(targetX, this.world.width * 2 - this.viewport.width));
    targetY = Math.max(0, Math.min(targetY, this.world.height * 2 - this.viewport.height));

    this.offsetX += (targetX - this.offsetX) * FOLLOW_EASING;
    this.offsetY += (targetY - this.offsetY) * FOLLOW_EASING;
  }

  toWorld(screen: Vec2): Vec2 {
    return { x: screen.x + this.offsetX, y: screen.y + this.offsetY };
  }
}
