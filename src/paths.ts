export default class LocalPaths {
  static STACK_CONFIG_FILENAME = 'stack.yml';
  static LOCK_DIRNAME = '.stackctl';
}
