export default class CliError extends Error { }
