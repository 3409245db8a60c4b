/**
 * @fileoverview Unit tests for LifecycleController
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LifecycleController } from './lifecycle.js';
import { AgentPhase } from '../types/index.js';

describe('LifecycleController', () => {
  let controller: LifecycleController;

  function runToActing(): void {
    controller.transition(AgentPhase.OBSERVING, 'Observe');
    controller.transition(AgentPhase.DECIDING, 'Decide');
    controller.transition(AgentPhase.ACTING, 'Act');
  }

  beforeEach(() => {
    controller = new LifecycleController();
  });

  describe('initial state', () => {
    it('should start in IDLE phase at step 0', () => {
      const state = controller.getState();

      expect(state.currentPhase).toBe(AgentPhase.IDLE);
      expect(state.previousPhase).toBeNull();
      expect(state.stepNumber).toBe(0);
      expect(state.phaseHistory).toEqual([]);
    });
  });

  describe('transition()', () => {
    it('should follow a full turn back to IDLE', () => {
      runToActing();
      controller.transition(AgentPhase.REFLECTING, 'Reflect');
      controller.transition(AgentPhase.IDLE, 'Done');

      expect(controller.getCurrentPhase()).toBe(AgentPhase.IDLE);
      expect(controller.getStepNumber()).toBe(5);
      expect(controller.getState().phaseHistory.map(e => e.phase)).toEqual([
        AgentPhase.IDLE,
        AgentPhase.OBSERVING,
        AgentPhase.DECIDING,
        AgentPhase.ACTING,
        AgentPhase.REFLECTING,
      ]);
    });

    it('should allow ACTING to loop back to DECIDING', () => {
      runToActing();
      controller.transition(AgentPhase.DECIDING, 'Capability result observed');

      expect(controller.getCurrentPhase()).toBe(AgentPhase.DECIDING);
      expect(controller.getState().previousPhase).toBe(AgentPhase.ACTING);
    });

    it('should throw on invalid transitions', () => {
      expect(() => controller.transition(AgentPhase.ACTING, 'Invalid')).toThrow(
        "Invalid transition: 'IDLE' → 'ACTING'",
      );
      expect(controller.getCurrentPhase()).toBe(AgentPhase.IDLE);
    });

    it('should not skip reflection after acting', () => {
      runToActing();

      expect(() => controller.transition(AgentPhase.IDLE, 'Skip')).toThrow();
    });

    it('should emit transition event on valid transition', () => {
      const handler = vi.fn();
      controller.on('transition', handler);

      controller.transition(AgentPhase.OBSERVING, 'Input received');

      expect(handler).toHaveBeenCalledWith(AgentPhase.IDLE, AgentPhase.OBSERVING, 'Input received');
    });

    it('should emit error event on invalid transition', () => {
      const handler = vi.fn();
      controller.on('error', handler);

      expect(() => controller.transition(AgentPhase.REFLECTING, 'Invalid')).toThrow();
      expect(handler).toHaveBeenCalledWith(
        expect.objectContaining({
          code: 'INVALID_TRANSITION',
          phase: AgentPhase.IDLE,
          attemptedTransition: AgentPhase.REFLECTING,
        }),
      );
    });
  });

  describe('canTransition()', () => {
    it('should reflect the state machine', () => {
      expect(controller.canTransition(AgentPhase.OBSERVING)).toBe(true);
      expect(controller.canTransition(AgentPhase.DECIDING)).toBe(false);

      runToActing();
      expect(controller.canTransition(AgentPhase.DECIDING)).toBe(true);
      expect(controller.canTransition(AgentPhase.REFLECTING)).toBe(true);
      expect(controller.canTransition(AgentPhase.OBSERVING)).toBe(false);
    });
  });

  describe('reset()', () => {
    it('should return to IDLE from any phase', () => {
      runToActing();
      controller.reset('Turn abandoned');

      expect(controller.getCurrentPhase()).toBe(AgentPhase.IDLE);
      expect(controller.getStepNumber()).toBe(4);
    });

    it('should do nothing when already IDLE', () => {
      const handler = vi.fn();
      controller.on('transition', handler);

      controller.reset('Nothing to do');

      expect(handler).not.toHaveBeenCalled();
      expect(controller.getStepNumber()).toBe(0);
    });
  });

  describe('phase events', () => {
    it('should emit phase:enter and phase:exit', () => {
      const enter = vi.fn();
      const exit = vi.fn();
      controller.on('phase:enter', enter);
      controller.on('phase:exit', exit);

      controller.transition(AgentPhase.OBSERVING, 'Starting', { inputLength: 5 });

      expect(exit).toHaveBeenCalledWith(AgentPhase.IDLE, expect.objectContaining({ reason: 'Session initialized' }));
      expect(enter).toHaveBeenCalledWith(
        AgentPhase.OBSERVING,
        expect.objectContaining({ reason: 'Starting', stepNumber: 1, data: { inputLength: 5 } }),
      );
    });
  });

  describe('history', () => {
    it('should keep only the most recent entries', () => {
      controller = new LifecycleController({ maxHistory: 2 });
      runToActing();

      expect(controller.getState().phaseHistory.map(e => e.phase)).toEqual([
        AgentPhase.OBSERVING,
        AgentPhase.DECIDING,
      ]);
    });
  });
});
