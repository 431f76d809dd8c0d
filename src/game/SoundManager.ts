// SoundManager.ts - Audio output port plus its Howler.js implementation
import { Howl } from 'howler';
import { Logger } from '../core/Logger';
import { DOWN, UP, equals, type Vec2 } from '../core/vector';

/** Fire-and-forget cues raised by the gameplay core. Purely observational. */
export type AudioCue =
  | { type: 'jump' }
  | { type: 'attack_hit'; direction: Vec2 }
  | { type: 'attack_miss' }
  | { type: 'pogo' }
  | { type: 'explosion' }
  | { type: 'hover_start'; sourceId: string }
  | { type: 'hover_stop'; sourceId: string };

/** Injected into every actor that makes noise. */
export interface AudioOutput {
  play(cue: AudioCue): void;
}

export const NullAudioOutput: AudioOutput = {
  play() { /* headless */ },
};

export type SoundKey = 'jump' | 'hit_forward' | 'hit_up' | 'hit_down' | 'miss' | 'pogo' | 'explosion' | 'hover';

export type SoundBank = Partial<Record<SoundKey, string>>;

/** The part of a Howl this module drives. */
export interface SoundHandle {
  play(): number;
  stop(): unknown;
  pause(): unknown;
  playing(): boolean;
  volume(v: number): unknown;
  unload(): void;
}

export interface SoundOptions {
  src: string[];
  loop: boolean;
  volume: number;
}

export type SoundFactory = (opts: SoundOptions) => SoundHandle;

const howlFactory: SoundFactory = (opts) => new Howl({
  src: opts.src,
  loop: opts.loop,
  volume: opts.volume,
  html5: opts.loop, // stream long loops, decode short effects
  onloaderror: (_id, err) => Logger.error('[SoundManager] load error: ' + String(err)),
});

/** Sample key for a confirmed hit; direction classification uses exact vector equality. */
export function hitSoundKey(direction: Vec2): SoundKey {
  if (equals(direction, DOWN)) return 'hit_down';
  if (equals(direction, UP)) return 'hit_up';
  return 'hit_forward';
}

/**
 * Manages background music and sound effects.
 * One instance per game session; actors only see it through AudioOutput.
 * @group Audio
 */
export class SoundManager implements AudioOutput {
  private readonly bank: SoundBank;
  private readonly createSound: SoundFactory;
  private readonly effects = new Map<SoundKey, SoundHandle>();
  private readonly hoverLoops = new Map<string, SoundHandle>();
  private bgMusic: SoundHandle | null = null;
  private currentMusicSrc: string | null = null;
  private musicVolume = 0.5; // 0..1
  private sfxVolume = 0.8; // 0..1

  constructor(bank: SoundBank, opts?: { factory?: SoundFactory; musicVolume?: number; sfxVolume?: number }) {
    this.bank = { ...bank };
    this.createSound = opts?.factory ?? howlFactory;
    if (opts?.musicVolume !== undefined) this.musicVolume = clamp01(opts.musicVolume);
    if (opts?.sfxVolume !== undefined) this.sfxVolume = clamp01(opts.sfxVolume);
  }

  play(cue: AudioCue): void {
    switch (cue.type) {
      case 'jump': this.playEffect('jump'); break;
      case 'attack_hit': this.playEffect(hitSoundKey(cue.direction)); break;
      case 'attack_miss': this.playEffect('miss'); break;
      case 'pogo': this.playEffect('pogo'); break;
      case 'explosion': this.playEffect('explosion'); break;
      case 'hover_start': this.startHover(cue.sourceId); break;
      case 'hover_stop': this.stopHover(cue.sourceId); break;
    }
  }

  /**
   * Play (or resume) background music. Switching to a different src unloads the previous track.
   */
  public playMusic(src: string): void {
    if (!this.bgMusic || this.currentMusicSrc !== src) {
      this.bgMusic?.unload();
      this.currentMusicSrc = src;
      this.bgMusic = this.createSound({ src: [src], loop: true, volume: this.musicVolume });
      Logger.debug('[SoundManager] playMusic src=', src);
    }
    if (!this.bgMusic.playing()) this.bgMusic.play();
  }

  /** Set bg music volume (0..1) */
  public setMusicVolume(v: number): void {
    this.musicVolume = clamp01(v);
    this.bgMusic?.volume(this.musicVolume);
  }

  public getMusicVolume(): number {
    return this.musicVolume;
  }

  /** Pause or resume the current track. */
  public toggleMusic(play: boolean): void {
    if (!this.bgMusic) return;
    if (play && !this.bgMusic.playing()) this.bgMusic.play();
    else if (!play && this.bgMusic.playing()) this.bgMusic.pause();
  }

  public stopMusic(): void {
    if (this.bgMusic?.playing()) this.bgMusic.stop();
  }

  public isMusicPlaying(): boolean {
    return this.bgMusic?.playing() ?? false;
  }

  /** Stop every loop and release all handles. */
  public dispose(): void {
    for (const h of this.hoverLoops.values()) h.unload();
    for (const h of this.effects.values()) h.unload();
    this.bgMusic?.unload();
    this.hoverLoops.clear();
    this.effects.clear();
    this.bgMusic = null;
    this.currentMusicSrc = null;
  }

  private playEffect(key: SoundKey): void {
    const handle = this.effect(key);
    if (handle) handle.play();
  }

  private effect(key: SoundKey): SoundHandle | null {
    const cached = this.effects.get(key);
    if (cached) return cached;
    const src = this.bank[key];
    if (!src) {
      Logger.debug(`[SoundManager] no sample for '${key}'`);
      return null;
    }
    const handle = this.createSound({ src: [src], loop: false, volume: this.sfxVolume });
    this.effects.set(key, handle);
    return handle;
  }

  private startHover(sourceId: string): void {
    let loop = this.hoverLoops.get(sourceId);
    if (!loop) {
      const src = this.bank.hover;
      if (!src) return;
      loop = this.createSound({ src: [src], loop: true, volume: this.sfxVolume * 0.5 });
      this.hoverLoops.set(sourceId, loop);
    }
    if (!loop.playing()) loop.play();
  }

  private stopHover(sourceId: string): void {
    const loop = this.hoverLoops.get(sourceId);
    if (loop && loop.playing()) loop.stop();
  }
}

function clamp01(v: number): number {
  return Math.max(0, Math.min(1, v));
}
