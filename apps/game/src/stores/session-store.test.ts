import { CharacterCatalog } from "../lib/character/catalog";
import { createSessionStore } from "./session-store";

const catalog = new CharacterCatalog();

function toNameEntry(characterStep = 0) {
  const store = createSessionStore(catalog);
  store.getState().confirmSlot();
  store.getState().cycleCharacter(characterStep);
  store.getState().confirmCharacter();
  return store;
}

describe("session store", () => {
  test("starts on file select with empty slots", () => {
    const state = createSessionStore(catalog).getState();
    expect(state.screen).toBe("file_select");
    expect(state.slots).toEqual([null, null, null]);
    expect(state.player).toBeNull();
  });

  test("slot selection wraps around", () => {
    const store = createSessionStore(catalog);
    store.getState().selectSlot(4);
    expect(store.getState().selectedSlot).toBe(1);
    store.getState().selectSlot(-1);
    expect(store.getState().selectedSlot).toBe(2);
  });

  test("character selection cycles through the catalog", () => {
    const store = createSessionStore(catalog);
    store.getState().confirmSlot();
    expect(store.getState().screen).toBe("character_select");

    store.getState().cycleCharacter(-1);
    expect(store.getState().characterIndex).toBe(19);
    store.getState().cycleCharacter(2);
    expect(store.getState().characterIndex).toBe(1);
    expect(store.getState().selectedCharacter()?.name).toBe("Brenna");
  });

  test("a valid name starts the game in the selected slot", () => {
    const store = createSessionStore(catalog);
    store.getState().selectSlot(1);
    store.getState().confirmSlot();
    store.getState().cycleCharacter(1);
    store.getState().confirmCharacter();
    expect(store.getState().screen).toBe("name_entry");

    store.getState().setNameDraft("  Robin ");
    store.getState().confirmName();

    const expected = { slot: 1, playerName: "Robin", characterName: "Brenna" };
    expect(store.getState().screen).toBe("playing");
    expect(store.getState().player).toEqual(expected);
    expect(store.getState().slots).toEqual([null, expected, null]);
  });

  test("a blank name stays on name entry with an error", () => {
    const store = toNameEntry();
    store.getState().setNameDraft("   ");
    store.getState().confirmName();
    expect(store.getState().screen).toBe("name_entry");
    expect(store.getState().nameError).toBe("name is empty");
  });

  test("a long name is refused", () => {
    const store = toNameEntry();
    store.getState().setNameDraft("ABCDEFGHIJKLM");
    store.getState().confirmName();
    expect(store.getState().nameError).toBe("name is longer than 12 characters");

    store.getState().setNameDraft("ABCDEFGHIJKL");
    expect(store.getState().nameError).toBeNull();
  });

  test("back steps one screen at a time", () => {
    const store = toNameEntry();
    store.getState().back();
    expect(store.getState().screen).toBe("character_select");
    store.getState().back();
    expect(store.getState().screen).toBe("file_select");
    store.getState().back();
    expect(store.getState().screen).toBe("file_select");
  });

  test("an occupied slot resumes straight into play", () => {
    const store = createSessionStore(catalog);
    const save = { slot: 0, playerName: "Robin", characterName: "Nyx" };
    store.setState({ slots: [save, null, null] });
    store.getState().confirmSlot();
    expect(store.getState().screen).toBe("playing");
    expect(store.getState().player).toEqual(save);
  });

  test("actions for other screens are ignored", () => {
    const store = createSessionStore(catalog);
    store.getState().cycleCharacter(3);
    store.getState().setNameDraft("Robin");
    store.getState().confirmName();
    expect(store.getState().characterIndex).toBe(0);
    expect(store.getState().nameDraft).toBe("");
    expect(store.getState().screen).toBe("file_select");
  });

  test("slot count follows the options", () => {
    expect(createSessionStore(catalog, { slotCount: 5 }).getState().slots).toHaveLength(5);
  });
});
