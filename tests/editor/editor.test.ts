/**
 * Editor tests: the command protocol, history integration, motion with
 * a goal column, and the prompt-driven file and quit commands.
 */

import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { Editor } from "../../src/editor/editor.ts";
import { createKeymap } from "../../src/editor/keymap.ts";
import { Damage, Keys, ctrl } from "../../src/editor/types.ts";
import { FakeDisplay, moveTo, press, run, setup, tempDir, typeText } from "../helpers.ts";

// ─── Command protocol ─────────────────────────────────────────────

describe("Editor - obey", () => {
  test("typing refreshes the cursor line", async () => {
    const s = setup();
    await typeText(s, "a");
    expect(s.display.refreshes).toEqual([{ damage: Damage.RewriteLine, row: 0, column: 1 }]);
  });

  test("every command clears the message", async () => {
    const s = setup("abc");
    s.display.setMessage("old news");
    await press(s, Keys.ArrowRight);
    expect(s.display.message).toBeUndefined();
  });

  test("a change is wrapped with point and mark before and after", async () => {
    const s = setup("xyz");
    moveTo(s, 0, 1);
    await typeText(s, "a");
    expect(s.editor.history.entries).toEqual([
      {
        kind: "composite",
        before: { point: 1, mark: 0 },
        inner: { kind: "mergeableInsertion", pos: 1, text: "a" },
        after: { point: 2, mark: 0 },
      },
    ]);
  });

  test("a command without a change records nothing", async () => {
    const s = setup("abc");
    await typeText(s, "x");
    const moved = await run(s, (ed) => {
      ed.moveCommand("right");
      return undefined;
    });
    expect(moved).toBe(false);
    expect(s.editor.history.entries).toHaveLength(1);
    expect(s.editor.history.position).toBe(1);
    expect(s.editor.history.amalgamating).toBe(false);
  });
});

// ─── History ──────────────────────────────────────────────────────

describe("Editor - Undo and redo", () => {
  test("a typed run is one undo step", async () => {
    const s = setup();
    await typeText(s, "abc");
    expect(s.editor.history.entries).toHaveLength(1);

    await press(s, ctrl("z"));
    expect(s.editor.buffer.text()).toBe("");
    expect(s.editor.buffer.point).toBe(0);

    await press(s, ctrl("y"));
    expect(s.editor.buffer.text()).toBe("abc");
    expect(s.editor.buffer.point).toBe(3);
  });

  test("runs split after a newline", async () => {
    const s = setup();
    await typeText(s, "ab\ncd");
    expect(s.editor.history.entries).toHaveLength(2);

    await press(s, ctrl("z"));
    expect(s.editor.buffer.text()).toBe("ab\n");
    expect(s.editor.buffer.point).toBe(3);
  });

  test("motion ends a run", async () => {
    const s = setup();
    await typeText(s, "ab");
    await press(s, Keys.ArrowLeft);
    await typeText(s, "x");
    expect(s.editor.buffer.text()).toBe("axb");
    expect(s.editor.history.entries).toHaveLength(2);
  });

  test("tab is its own undo step", async () => {
    const s = setup();
    await press(s, Keys.Tab);
    await typeText(s, "x");
    expect(s.editor.buffer.text()).toBe("  x");
    expect(s.editor.history.entries).toHaveLength(2);
  });

  test("undo back to the initial state, then beep", async () => {
    const s = setup("base");
    moveTo(s, 0, 4);
    await typeText(s, "12");
    await press(s, Keys.Backspace, Keys.Home);
    await typeText(s, ">");
    expect(s.editor.buffer.text()).toBe(">base1");

    await press(s, ctrl("z"), ctrl("z"), ctrl("z"));
    expect(s.editor.buffer.text()).toBe("base");
    expect(s.editor.buffer.point).toBe(4);
    expect(s.editor.buffer.mark).toBe(0);
    expect(s.editor.buffer.modified).toBe(true);
    expect(s.display.beeps).toBe(0);

    await press(s, ctrl("z"));
    expect(s.display.beeps).toBe(1);
  });

  test("redo with nothing undone beeps", async () => {
    const s = setup();
    await typeText(s, "a");
    await press(s, ctrl("y"));
    expect(s.display.beeps).toBe(1);
    expect(s.editor.buffer.text()).toBe("a");
  });

  test("an edit after undo discards the redo tail", async () => {
    const s = setup();
    await typeText(s, "a\n");
    await typeText(s, "b");
    await press(s, ctrl("z"));
    await typeText(s, "c");
    await press(s, ctrl("y"));
    expect(s.display.beeps).toBe(1);
    expect(s.editor.buffer.text()).toBe("a\nc");
  });

  test("undo all and redo all across different commands", async () => {
    const s = setup("one\ntwo");
    moveTo(s, 0, 3);
    await typeText(s, "!");
    await press(s, ctrl("k"), Keys.Home, ctrl("u"), Keys.End, Keys.Backspace, ctrl("t"));
    const buffer = s.editor.buffer;
    expect(buffer.text()).toBe("ONE!wt");
    expect(buffer.point).toBe(6);
    expect(s.editor.history.entries).toHaveLength(5);

    const undone: [string, number][] = [];
    for (let i = 0; i < 5; i++) {
      await press(s, ctrl("z"));
      undone.push([buffer.text(), buffer.point]);
    }
    expect(undone).toEqual([
      ["ONE!tw", 6],
      ["ONE!two", 7],
      ["one!two", 0],
      ["one!\ntwo", 4],
      ["one\ntwo", 3],
    ]);
    expect(s.display.beeps).toBe(0);

    const redone: [string, number][] = [];
    for (let i = 0; i < 5; i++) {
      await press(s, ctrl("y"));
      redone.push([buffer.text(), buffer.point]);
    }
    expect(redone).toEqual([
      ["one!\ntwo", 4],
      ["one!two", 4],
      ["ONE!two", 0],
      ["ONE!tw", 6],
      ["ONE!wt", 6],
    ]);
    expect(buffer.mark).toBe(0);
    await press(s, ctrl("y"));
    expect(s.display.beeps).toBe(1);
  });

  test("undo and redo of a typed run carry the mark after it", async () => {
    const s = setup("xy");
    moveTo(s, 0, 2);
    await press(s, ctrl("x"));
    moveTo(s, 0, 1);
    await typeText(s, "abc");
    expect(s.editor.buffer.text()).toBe("xabcy");
    expect(s.editor.buffer.mark).toBe(5);
    expect(s.editor.history.entries).toHaveLength(1);

    await press(s, ctrl("z"));
    expect(s.editor.buffer.text()).toBe("xy");
    expect(s.editor.buffer.point).toBe(1);
    expect(s.editor.buffer.mark).toBe(2);

    await press(s, ctrl("y"));
    expect(s.editor.buffer.text()).toBe("xabcy");
    expect(s.editor.buffer.point).toBe(4);
    expect(s.editor.buffer.mark).toBe(5);
  });

  test("undo restores the mark", async () => {
    const s = setup("hello");
    moveTo(s, 0, 3);
    await press(s, ctrl("x"));
    moveTo(s, 0, 1);
    await press(s, Keys.Delete);
    expect(s.editor.buffer.mark).toBe(2);
    await press(s, ctrl("z"));
    expect(s.editor.buffer.text()).toBe("hello");
    expect(s.editor.buffer.mark).toBe(3);
  });
});

// ─── Motion ───────────────────────────────────────────────────────

describe("Editor - Vertical motion", () => {
  test("the goal column survives short lines", async () => {
    const s = setup("long line here\nab\nanother long");
    moveTo(s, 0, 10);
    await press(s, Keys.ArrowDown);
    expect(s.editor.buffer.point).toBe(17);
    await press(s, Keys.ArrowDown);
    expect(s.editor.buffer.point).toBe(28);
  });

  test("any other command forgets the goal column", async () => {
    const s = setup("long line here\nab\nanother long");
    moveTo(s, 0, 10);
    await press(s, Keys.ArrowDown, Keys.ArrowLeft, Keys.ArrowDown);
    expect(s.editor.buffer.point).toBe(19);
  });

  test("up on the first row beeps but keeps the goal", async () => {
    const s = setup("abcdef\nxy\nabcdef");
    moveTo(s, 0, 4);
    await press(s, Keys.ArrowUp);
    expect(s.display.beeps).toBe(1);
    expect(s.editor.buffer.point).toBe(4);

    await press(s, Keys.ArrowDown);
    expect(s.editor.buffer.point).toBe(9);
    await press(s, Keys.ArrowDown);
    expect(s.editor.buffer.point).toBe(14);
  });

  test("down on the last row beeps", async () => {
    const s = setup("ab\ncd");
    moveTo(s, 1, 1);
    await press(s, Keys.ArrowDown);
    expect(s.display.beeps).toBe(1);
    expect(s.editor.buffer.point).toBe(4);
  });

  test("page down scrolls and moves to a row start", async () => {
    const s = setup(Array.from({ length: 40 }, (_, i) => `line ${i}`).join("\n"));
    moveTo(s, 2, 3);
    await press(s, Keys.PageDown);
    expect(s.display.scrolls).toEqual([17]);
    expect(s.editor.buffer.getRow(s.editor.buffer.point)).toBe(19);
    expect(s.editor.buffer.getColumn(s.editor.buffer.point)).toBe(0);

    await press(s, Keys.PageUp);
    expect(s.display.scrolls).toEqual([17, -17]);
    expect(s.editor.buffer.getRow(s.editor.buffer.point)).toBe(2);
  });

  test("left at the start beeps and stays", async () => {
    const s = setup("ab");
    await press(s, Keys.ArrowLeft);
    expect(s.display.beeps).toBe(1);
    expect(s.editor.buffer.point).toBe(0);
  });

  test("moving to another row after a line edit rewrites everything", async () => {
    const s = setup("ab\ncd");
    await run(s, (ed) => {
      ed.insertCommand("x");
      ed.moveCommand("down");
      return undefined;
    });
    expect(s.display.lastRefresh()).toEqual({ damage: Damage.Rewrite, row: 1, column: 1 });
  });
});

// ─── Editing commands ─────────────────────────────────────────────

describe("Editor - Deletion", () => {
  test("backspace deletes before the cursor", async () => {
    const s = setup("abc");
    moveTo(s, 0, 2);
    await press(s, Keys.Backspace);
    expect(s.editor.buffer.text()).toBe("ac");
    expect(s.editor.buffer.point).toBe(1);
  });

  test("backspace removes a whole surrogate pair", async () => {
    const s = setup("a😀b");
    moveTo(s, 0, 3);
    await press(s, Keys.Backspace);
    expect(s.editor.buffer.text()).toBe("ab");
    expect(s.editor.buffer.point).toBe(1);

    await press(s, ctrl("z"));
    expect(s.editor.buffer.text()).toBe("a😀b");
    expect(s.editor.buffer.point).toBe(3);
  });

  test("delete after stepping left over a surrogate pair", async () => {
    const s = setup("a😀b");
    moveTo(s, 0, 3);
    await press(s, Keys.ArrowLeft);
    expect(s.editor.buffer.point).toBe(1);
    await press(s, Keys.Delete);
    expect(s.editor.buffer.text()).toBe("ab");
    expect(s.editor.buffer.point).toBe(1);

    await press(s, ctrl("z"));
    expect(s.editor.buffer.text()).toBe("a😀b");
  });

  test("backspace at the start beeps", async () => {
    const s = setup("abc");
    expect(await run(s, (ed) => ed.deleteCommand("left"))).toBe(false);
    expect(s.display.beeps).toBe(1);
  });

  test("delete at the end beeps", async () => {
    const s = setup("abc");
    moveTo(s, 0, 3);
    await press(s, ctrl("d"));
    expect(s.display.beeps).toBe(1);
    expect(s.editor.buffer.text()).toBe("abc");
  });

  test("kill to end of line, then join the next line", async () => {
    const s = setup("hello\nworld");
    moveTo(s, 0, 2);
    await press(s, ctrl("k"));
    expect(s.editor.buffer.text()).toBe("he\nworld");
    await press(s, ctrl("k"));
    expect(s.editor.buffer.text()).toBe("heworld");
    expect(s.editor.buffer.point).toBe(2);
    expect(s.editor.history.entries).toHaveLength(2);

    await press(s, ctrl("z"), ctrl("z"));
    expect(s.editor.buffer.text()).toBe("hello\nworld");
  });

  test("kill at the end of the buffer beeps", async () => {
    const s = setup("ab");
    moveTo(s, 0, 2);
    await press(s, ctrl("k"));
    expect(s.display.beeps).toBe(1);
  });

  test("other directions are rejected", () => {
    const s = setup("ab");
    expect(() => s.editor.deleteCommand("up")).toThrow(RangeError);
  });
});

describe("Editor - Transpose and uppercase", () => {
  test("transpose at the end of a line and undo it", async () => {
    const s = setup("hello\nworld");
    moveTo(s, 0, 5);
    await press(s, ctrl("t"));
    expect(s.editor.buffer.text()).toBe("helol\nworld");
    expect(s.editor.buffer.point).toBe(5);

    await press(s, ctrl("z"));
    expect(s.editor.buffer.text()).toBe("hello\nworld");
    expect(s.editor.buffer.point).toBe(5);
  });

  test("transpose on a short line beeps", async () => {
    const s = setup("a\nbc");
    await press(s, ctrl("t"));
    expect(s.display.beeps).toBe(1);
    expect(s.editor.history.entries).toHaveLength(0);
  });

  test("uppercase the word under the cursor", async () => {
    const s = setup("say hello world");
    moveTo(s, 0, 6);
    await press(s, ctrl("u"));
    expect(s.editor.buffer.text()).toBe("say HELLO world");
    expect(s.editor.buffer.point).toBe(6);

    await press(s, ctrl("z"));
    expect(s.editor.buffer.text()).toBe("say hello world");
    await press(s, ctrl("y"));
    expect(s.editor.buffer.text()).toBe("say HELLO world");
  });

  test("uppercase off a word beeps", async () => {
    const s = setup("a b");
    moveTo(s, 0, 1);
    await press(s, ctrl("u"));
    expect(s.display.beeps).toBe(1);
    expect(s.editor.buffer.modified).toBe(false);
  });
});

describe("Editor - Mark", () => {
  test("set the mark and swap it with point", async () => {
    const s = setup("abcdef");
    moveTo(s, 0, 2);
    await press(s, ctrl("x"), Keys.End, ctrl("o"));
    expect(s.editor.buffer.point).toBe(2);
    expect(s.editor.buffer.mark).toBe(6);
  });
});

describe("Editor - Display commands", () => {
  test("Ctrl+L recenters and rewrites", async () => {
    const s = setup("abc");
    await press(s, ctrl("l"));
    expect(s.display.origins).toBe(1);
    expect(s.display.lastRefresh()).toEqual({ damage: Damage.Rewrite, row: 0, column: 0 });
  });

  test("Ctrl+G beeps", async () => {
    const s = setup("abc");
    await press(s, ctrl("g"));
    expect(s.display.beeps).toBe(1);
  });
});

// ─── Files and quitting ───────────────────────────────────────────

describe("Editor - Files", () => {
  test("save prompts with the current filename", async () => {
    const dir = await tempDir();
    const path = join(dir, "saved.txt");
    const s = setup();
    await typeText(s, "text");
    s.display.replies = [path];

    await press(s, ctrl("w"));
    expect(s.display.prompts).toEqual([{ prompt: "Write file", initial: "" }]);
    expect(await readFile(path, "utf8")).toBe("text");
    expect(s.editor.buffer.modified).toBe(false);
    expect(s.editor.buffer.filename).toBe(path);
  });

  test("cancelled save writes nothing", async () => {
    const s = setup("text");
    s.display.replies = [undefined];
    await press(s, ctrl("w"));
    expect(s.editor.buffer.filename).toBe("");
  });

  test("read file replaces the buffer and clears history", async () => {
    const dir = await tempDir();
    const path = join(dir, "other.txt");
    await writeFile(path, "other text", "utf8");
    const s = setup("mine");
    s.display.replies = [path];

    await press(s, ctrl("r"));
    expect(s.display.questions).toEqual([]);
    expect(s.display.prompts).toEqual([{ prompt: "Read file", initial: "" }]);
    expect(s.editor.buffer.text()).toBe("other text");
    expect(s.editor.history.entries).toHaveLength(0);
  });

  test("read file over unsaved changes asks first", async () => {
    const s = setup("mine");
    await typeText(s, "!");
    s.display.answers = [false];

    await press(s, ctrl("r"));
    expect(s.display.questions).toEqual(["Buffer modified -- really overwrite?"]);
    expect(s.display.prompts).toEqual([]);
    expect(s.editor.buffer.text()).toBe("!mine");
  });

  test("a failed read keeps the history", async () => {
    const dir = await tempDir();
    const path = join(dir, "missing.txt");
    const s = setup("mine");
    await typeText(s, "!");
    s.display.answers = [true];
    s.display.replies = [path];

    await press(s, ctrl("r"));
    expect(s.editor.buffer.text()).toBe("!mine");
    expect(s.editor.history.entries).toHaveLength(1);
    expect(s.display.message).toBe(`Couldn't read file '${path}'`);
  });
});

describe("Editor - Quit", () => {
  test("quits at once when nothing is modified", async () => {
    const s = setup("abc");
    await press(s, ctrl("q"));
    expect(s.display.questions).toEqual([]);
    expect(s.editor.alive).toBe(false);
  });

  test("asks before discarding changes", async () => {
    const s = setup("abc");
    await typeText(s, "x");
    s.display.answers = [false];
    await press(s, ctrl("q"));
    expect(s.display.questions).toEqual(["Buffer modified -- really quit?"]);
    expect(s.editor.alive).toBe(true);
  });
});

describe("Editor - run", () => {
  test("reads keys until quit", async () => {
    const display = new FakeDisplay();
    const editor = new Editor(display);
    display.keys = ["h", ctrl("c"), "i", ctrl("q")];
    display.answers = [true];

    await editor.run(createKeymap());
    expect(editor.buffer.text()).toBe("hi");
    expect(display.beeps).toBe(1);
    expect(editor.alive).toBe(false);
    expect(display.view).toBe(editor.buffer);
    expect(display.refreshes[0]).toEqual({ damage: Damage.Rewrite, row: 0, column: 0 });
  });
});
