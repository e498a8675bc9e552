import axios from "axios";

// Same-origin requests only: the session cookie rides along without withCredentials.
export const http = axios.create();
