// React relies on this flag to suppress act() warnings in test runners.
Reflect.set(globalThis, "IS_REACT_ACT_ENVIRONMENT", true);
