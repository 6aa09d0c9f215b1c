export default [
  {
    type: "function",
    name: "getOrderStatus",
    inputs: [
      {
        name: "orderHash",
        type: "bytes32",
        internalType: "bytes32",
      },
    ],
    outputs: [
      {
        name: "",
        type: "tuple",
        internalType: "struct OrderStatus",
        components: [
          {
            name: "isFilledOrCancelled",
            type: "bool",
            internalType: "bool",
          },
          {
            name: "remaining",
            type: "uint256",
            internalType: "uint256",
          },
        ],
      },
    ],
    stateMutability: "view",
  },
] as const
