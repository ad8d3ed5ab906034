declare module 'javascript-state-machine' {
  interface Transition {
    name: string;
    from: string | string[];
    to: string;
  }

  interface Config {
    init: string;
    transitions: Transition[];
  }

  class StateMachine {
    constructor(config: Config);
    state: string;
    can(transition: string): boolean;
    [key: string]: unknown;
  }

  export = StateMachine;
}
