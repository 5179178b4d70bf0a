export interface ConsoleOutput {
    log(message: string): void;
    warn(message: string): void;
}
