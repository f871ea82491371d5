import isCi from 'is-ci';

export default class PromptUtils {
  private static disabled = false;

  // if we're not running in a CI environment or in a non-tty stdout then prompts should be available
  public static promptsAvailable(): boolean {
    return !(PromptUtils.disabled || isCi || !process.stdout.isTTY);
  }

  public static disablePrompts(): void {
    PromptUtils.disabled = true;
  }
}
