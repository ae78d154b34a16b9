export { type Disposable, isDisposable, toDisposable } from "./Disposable";
export { DisposalTracker } from "./DisposalTracker";
export { ObjectDisposedError } from "./ObjectDisposedError";
export { describeOwner } from "./describeOwner";
