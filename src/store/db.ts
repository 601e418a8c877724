import type * as types from "../types";
import { applyPatch, defaultForm } from "../form";

/**
 * In-memory state of the settings editor
 *
 * Features:
 * - Holds the form exactly as entered (text fields stay unparsed)
 * - Partial updates of scalar fields and avoided days
 * - Append / remove entries of the avoided time list
 *
 * Nothing is persisted: state lives for the lifetime of the process.
 */
class MemoryStore {
    private form: types.SettingsForm = defaultForm();

    /**
     * Get a copy of the current form
     */
    getSettings(): types.SettingsForm {
        return {
            ...this.form,
            avoidDays: [...this.form.avoidDays],
            avoidTimes: this.form.avoidTimes.map(entry => ({ ...entry }))
        };
    }

    /**
     * Merge changed fields into the form
     *
     * @param patch - Fields to replace; undefined fields are left untouched
     * @returns Updated form
     */
    updateSettings(patch: Partial<types.SettingsForm>): types.SettingsForm {
        this.form = applyPatch(this.form, patch);
        return this.getSettings();
    }

    /**
     * Append an entry to the avoided time list
     *
     * @param entry - Day and normalized HH:MM times
     * @returns Updated form
     */
    addAvoidTime(entry: types.AvoidTimeEntry): types.SettingsForm {
        this.form.avoidTimes = [...this.form.avoidTimes, entry];
        return this.getSettings();
    }

    /**
     * Remove an entry of the avoided time list by position
     *
     * @param index - 0-based position
     * @returns true if an entry was removed, false if the index is out of range
     */
    removeAvoidTime(index: number): boolean {
        if (index < 0 || index >= this.form.avoidTimes.length) return false;
        this.form.avoidTimes = this.form.avoidTimes.filter((_, i) => i !== index);
        return true;
    }

    /**
     * Restore the default form
     */
    reset() {
        this.form = defaultForm();
    }
}

const store = new MemoryStore();

export default store;
