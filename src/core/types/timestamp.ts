// Milliseconds since epoch; converted to ISO strings only at the edges
export type Timestamp = number;
