import { SettingsError } from '../errors';
import type { ProcessingTask } from './task';
import type { SettingValue, TaskSettings } from './settings';

export interface SettingField {
  name: string;
  description: string;
  value: SettingValue;
}

/**
 * Edit session over a task's browsable settings. Edits stay on a working
 * copy until `confirm` applies them to the task; `cancel` drops them.
 */
export class TaskSettingsEditor {
  private values: TaskSettings;
  private changed = false;

  constructor(private task: ProcessingTask) {
    this.values = { ...task.getSettings() };
  }

  get title(): string {
    return `Edit Task Settings: ${this.task.displayName}`;
  }

  get dirty(): boolean {
    return this.changed;
  }

  get fields(): SettingField[] {
    const descriptions = this.task.settingDescriptions;
    return this.task.browsableSettings.map((name) => ({
      name,
      description: descriptions[name] ?? name,
      value: this.values[name],
    }));
  }

  set(name: string, value: SettingValue): void {
    if (!this.task.browsableSettings.includes(name)) {
      throw new SettingsError(`${this.task.typeName} has no editable setting "${name}"`);
    }
    this.values[name] = value;
    this.changed = true;
  }

  /**
   * Apply the edited values to the task, and save them when a settings
   * directory is given. Invalid values leave the task untouched.
   */
  async confirm(settingsDirectory?: string): Promise<ProcessingTask> {
    const candidate = this.task.clone();
    try {
      candidate.applySettings({ ...this.task.getSettings(), ...this.values });
    } catch (err) {
      throw new SettingsError(
        `Invalid settings for ${this.task.typeName}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
    this.task.applySettings(candidate.getSettings());
    this.changed = false;
    if (settingsDirectory) {
      await this.task.saveToFile(settingsDirectory);
    }
    return this.task;
  }

  cancel(): void {
    this.values = { ...this.task.getSettings() };
    this.changed = false;
  }
}
