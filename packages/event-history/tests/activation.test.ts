/**
 * Tests for ActivationController.
 *
 * Last writer wins between administrative and listener-driven writes.
 */

import { describe, it, expect, vi } from "vitest";
import { ActivationController } from "../src/activation.js";

describe("ActivationController", () => {
  it("starts dormant", () => {
    const activation = new ActivationController();
    expect(activation.isActive()).toBe(false);
    expect(activation.state).toBe("dormant");
  });

  it("set() switches the state either way", () => {
    const activation = new ActivationController();
    activation.set(true);
    expect(activation.state).toBe("recording");
    activation.set(false);
    expect(activation.state).toBe("dormant");
  });

  it("listenerAdded() overrides an administrative off", () => {
    const activation = new ActivationController();
    activation.set(false);
    activation.listenerAdded();
    expect(activation.isActive()).toBe(true);
  });

  it("listenersEmptied() overrides an administrative on", () => {
    const activation = new ActivationController();
    activation.set(true);
    activation.listenersEmptied();
    expect(activation.isActive()).toBe(false);
  });

  it("an administrative write overrides a listener-driven one", () => {
    const activation = new ActivationController();
    activation.listenerAdded();
    activation.set(false);
    expect(activation.isActive()).toBe(false);
  });

  it("reports actual transitions with their cause", () => {
    const observer = vi.fn();
    const activation = new ActivationController(observer);

    activation.listenerAdded();
    activation.listenerAdded();
    activation.set(false);
    activation.listenersEmptied();

    expect(observer).toHaveBeenCalledTimes(2);
    expect(observer).toHaveBeenNthCalledWith(1, "dormant", "recording", "listener-added");
    expect(observer).toHaveBeenNthCalledWith(2, "recording", "dormant", "admin");
  });
});
