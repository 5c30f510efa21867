import { assert, describe, test } from "@textvision/testkit";
import {
  EV_BROADCAST,
  EV_COMMAND,
  EV_KEYBOARD,
  EV_MESSAGE,
  EV_MOUSE,
  EV_MOUSE_DOWN,
  EV_MOUSE_WHEEL_DOWN,
  EV_NOTHING,
  NOTHING,
  RoutedEvent,
  broadcastEvent,
  commandEvent,
  eventMask,
  isMouseEvent,
  keyEvent,
  mouseEvent,
} from "../events.js";

describe("eventMask", () => {
  test("each kind maps to its own bit", () => {
    assert.equal(eventMask(NOTHING), EV_NOTHING);
    assert.equal(eventMask(keyEvent(0x61)), EV_KEYBOARD);
    assert.equal(eventMask(mouseEvent("mouseDown", 1, 1, 1)), EV_MOUSE_DOWN);
    assert.equal(eventMask(mouseEvent("mouseWheelDown", 0, 0)), EV_MOUSE_WHEEL_DOWN);
    assert.equal(eventMask(commandEvent(10)), EV_COMMAND);
    assert.equal(eventMask(broadcastEvent(10)), EV_BROADCAST);
  });

  test("EV_MESSAGE covers commands and broadcasts only", () => {
    assert.notEqual(eventMask(commandEvent(10)) & EV_MESSAGE, 0);
    assert.notEqual(eventMask(broadcastEvent(10)) & EV_MESSAGE, 0);
    assert.equal(eventMask(keyEvent(0x61)) & EV_MESSAGE, 0);
    assert.equal(eventMask(mouseEvent("mouseUp", 0, 0)) & EV_MESSAGE, 0);
  });

  test("EV_MOUSE covers every mouse kind", () => {
    for (const kind of ["mouseDown", "mouseUp", "mouseMove", "mouseAuto", "mouseWheelUp", "mouseWheelDown"] as const) {
      assert.equal(isMouseEvent(mouseEvent(kind, 0, 0)), true, kind);
      assert.notEqual(eventMask(mouseEvent(kind, 0, 0)) & EV_MOUSE, 0);
    }
    assert.equal(isMouseEvent(keyEvent(0x61)), false);
  });
});

describe("RoutedEvent", () => {
  test("clear consumes and replace swaps the event", () => {
    const routed = new RoutedEvent(keyEvent(0x61));
    assert.equal(routed.consumed, false);
    routed.replace(commandEvent(10));
    assert.deepEqual(routed.event, commandEvent(10));
    routed.clear();
    assert.equal(routed.consumed, true);
    assert.equal(routed.event, NOTHING);
  });
});
